import {
  COLUMNS,
  createRowReader,
  readRecord,
  recordToRow,
  rowToValues,
  upsertRecord,
  type JournalRecord,
} from '../journal/record';
import type { RecordStore } from './recordStore';

export const SHEETS_API_BASE = 'https://sheets.googleapis.com/v4/spreadsheets';

export interface SheetsStoreOptions {
  spreadsheetId: string;
  accessToken: string;
  sheetName: string;
  fetchImpl?: typeof fetch;
  retries?: number;
  retryDelayMs?: number;
}

const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 1_000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const isRetryableStatus = (status: number) => status === 429 || status >= 500;

// A1-нотация: имя листа в кавычках, одинарные кавычки удваиваются
const quoteSheetName = (sheetName: string) => `'${sheetName.replace(/'/g, "''")}'`;

const readValues = (json: unknown): unknown[][] => {
  if (!json || typeof json !== 'object' || !('values' in json) || !Array.isArray(json.values)) {
    return [];
  }
  return json.values.filter((row): row is unknown[] => Array.isArray(row));
};

const readSheetTitles = (json: unknown): string[] => {
  if (!json || typeof json !== 'object' || !('sheets' in json) || !Array.isArray(json.sheets)) {
    return [];
  }
  return json.sheets
    .map((sheet) => sheet?.properties?.title)
    .filter((title): title is string => typeof title === 'string');
};

/**
 * Журнал в листе Google Sheets (REST API v4). Первая строка листа — заголовок COLUMNS.
 */
export const createSheetsRecordStore = (options: SheetsStoreOptions): RecordStore => {
  const {
    spreadsheetId,
    accessToken,
    sheetName,
    fetchImpl = fetch,
    retries = DEFAULT_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
  } = options;

  const spreadsheetUrl = `${SHEETS_API_BASE}/${encodeURIComponent(spreadsheetId)}`;
  const sheetRange = quoteSheetName(sheetName);
  let worksheetReady = false;

  const sheetsRequest = async (url: string, init: RequestInit = {}, attemptsLeft = retries): Promise<unknown> => {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Bearer ${accessToken}`);
    headers.set('Content-Type', 'application/json');

    const response = await fetchImpl(url, { ...init, headers });
    if (response.ok) {
      return response.json();
    }

    if (isRetryableStatus(response.status) && attemptsLeft > 0) {
      console.warn(`⚠️ [SHEETS] ${response.status} ${response.statusText}, retries left: ${attemptsLeft}`);
      await sleep(retryDelayMs);
      return sheetsRequest(url, init, attemptsLeft - 1);
    }

    throw new Error(`Sheets request failed: ${response.status} ${response.statusText}`);
  };

  const valuesUrl = (range: string, suffix = '') => `${spreadsheetUrl}/values/${encodeURIComponent(range)}${suffix}`;

  const writeValues = async (values: string[][]) => {
    await sheetsRequest(valuesUrl(`${sheetRange}!A1`, '?valueInputOption=RAW'), {
      method: 'PUT',
      body: JSON.stringify({ values }),
    });
  };

  // Лист создаётся с заголовком, если его ещё нет
  const ensureWorksheet = async () => {
    if (worksheetReady) {
      return;
    }

    const metadata = await sheetsRequest(`${spreadsheetUrl}?fields=sheets.properties.title`);
    if (!readSheetTitles(metadata).includes(sheetName)) {
      console.log(`📄 [SHEETS] Creating worksheet "${sheetName}"`);
      await sheetsRequest(`${spreadsheetUrl}:batchUpdate`, {
        method: 'POST',
        body: JSON.stringify({ requests: [{ addSheet: { properties: { title: sheetName } } }] }),
      });
      await writeValues([[...COLUMNS]]);
    }

    worksheetReady = true;
  };

  return {
    target: 'remote',

    async load() {
      await ensureWorksheet();

      const [header = [], ...rows] = readValues(await sheetsRequest(valuesUrl(sheetRange)));
      const headerNames = header.map((cell) => String(cell ?? '').trim());

      return rows
        .map((values) => readRecord(createRowReader(headerNames, values)))
        .filter((record): record is JournalRecord => record !== null)
        .reduce<JournalRecord[]>((result, record) => upsertRecord(result, record), []);
    },

    async save(records) {
      await ensureWorksheet();

      await sheetsRequest(valuesUrl(sheetRange, ':clear'), { method: 'POST', body: '{}' });
      await writeValues([[...COLUMNS], ...records.map((record) => rowToValues(recordToRow(record)))]);
      console.log(`💾 [SHEETS] Saved ${records.length} records to "${sheetName}"`);

      return 'remote';
    },
  };
};
