import fs from 'fs/promises';
import path from 'path';
import { sanitizeRecord, upsertRecord, type JournalRecord } from '../journal/record';
import type { RecordStore } from './recordStore';

export const JOURNAL_FILE_NAME = 'journal.json';

interface StoredJournal {
  records: JournalRecord[];
  updatedAt: string;
}

const sanitizeJournal = (input: unknown): JournalRecord[] => {
  if (!input || typeof input !== 'object' || !('records' in input) || !Array.isArray(input.records)) {
    return [];
  }

  return input.records
    .map((record) => sanitizeRecord(record))
    .filter((record): record is JournalRecord => record !== null)
    .reduce<JournalRecord[]>((result, record) => upsertRecord(result, record), []);
};

/**
 * Журнал в JSON-файле внутри dataDir
 */
export const createLocalRecordStore = (dataDir: string): RecordStore => {
  const filePath = path.join(dataDir, JOURNAL_FILE_NAME);

  const ensureDataDir = async () => {
    await fs.mkdir(dataDir, { recursive: true });
  };

  return {
    target: 'local',

    async load() {
      try {
        const raw = await fs.readFile(filePath, 'utf-8');
        return sanitizeJournal(JSON.parse(raw));
      } catch (error: unknown) {
        // Файла ещё нет — журнал пуст
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return [];
        }
        throw error;
      }
    },

    async save(records) {
      await ensureDataDir();

      const stored: StoredJournal = {
        records: sanitizeJournal({ records }),
        updatedAt: new Date().toISOString(),
      };

      await fs.writeFile(filePath, JSON.stringify(stored, null, 2), 'utf-8');
      console.log(`💾 [JOURNAL] Saved ${stored.records.length} records to ${filePath}`);

      return 'local';
    },
  };
};
