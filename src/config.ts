import path from 'path';
import type { StorageTarget } from './storage/recordStore';

export interface SheetsConfig {
  spreadsheetId: string | null;
  accessToken: string | null;
  sheetName: string;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  sheets: SheetsConfig;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_SHEET_NAME = 'data';
export const DEFAULT_DATA_DIR = path.join(__dirname, '../data');

const readEnv = (env: NodeJS.ProcessEnv, key: string): string | null => {
  const value = env[key]?.trim();
  return value ? value : null;
};

const parsePort = (raw: string | null): number => {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
};

/**
 * Конфигурация из переменных окружения (.env подхватывает dotenv в server.ts)
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const dataDir = readEnv(env, 'DATA_DIR');

  return {
    port: parsePort(readEnv(env, 'PORT')),
    dataDir: dataDir ? path.resolve(dataDir) : DEFAULT_DATA_DIR,
    sheets: {
      spreadsheetId: readEnv(env, 'SHEETS_SPREADSHEET_ID'),
      accessToken: readEnv(env, 'SHEETS_ACCESS_TOKEN'),
      sheetName: readEnv(env, 'SHEETS_SHEET_NAME') ?? DEFAULT_SHEET_NAME,
    },
  };
};

export const resolveStorageTarget = (config: AppConfig): StorageTarget =>
  config.sheets.spreadsheetId && config.sheets.accessToken ? 'remote' : 'local';
