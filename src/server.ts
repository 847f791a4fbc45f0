import dotenv from 'dotenv';
import path from 'path';
import { createApp } from './app';
import { loadConfig, resolveStorageTarget } from './config';
import { createLocalRecordStore } from './storage/localRecordStore';
import { createJournalStore } from './storage/recordStore';
import { createSheetsRecordStore } from './storage/sheetsRecordStore';

dotenv.config();

const config = loadConfig(process.env);
const target = resolveStorageTarget(config);
const { spreadsheetId, accessToken, sheetName } = config.sheets;

const store = createJournalStore({
  target,
  local: createLocalRecordStore(config.dataDir),
  remote:
    spreadsheetId && accessToken ? createSheetsRecordStore({ spreadsheetId, accessToken, sheetName }) : null,
});

const app = createApp({
  store,
  staticDirs: [path.join(__dirname, '../miniapp/public'), path.join(__dirname, '../miniapp/dist')],
});

// Слушаем на всех интерфейсах (0.0.0.0) для работы через прокси
app.listen(config.port, '0.0.0.0', () => {
  console.log(`✅ Server running on http://0.0.0.0:${config.port}`);
  console.log(`🗂️ Storage: ${target === 'remote' ? `spreadsheet "${sheetName}"` : config.dataDir}`);
});

export { app };
