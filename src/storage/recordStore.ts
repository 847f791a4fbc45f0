import type { JournalRecord } from '../journal/record';

export type StorageTarget = 'local' | 'remote';

/**
 * Хранилище записей журнала. Не больше одной записи на дату.
 */
export interface RecordStore {
  readonly target: StorageTarget;
  load(): Promise<JournalRecord[]>;
  save(records: readonly JournalRecord[]): Promise<StorageTarget>;
}

export interface JournalStoreOptions {
  target: StorageTarget;
  local: RecordStore;
  remote?: RecordStore | null;
}

/**
 * Основное хранилище: онлайн-таблица, если она настроена, с откатом на локальный файл.
 * Возвращает цель, в которую реально ушла запись.
 */
export const createJournalStore = ({ target, local, remote = null }: JournalStoreOptions): RecordStore => {
  const remoteStore = target === 'remote' ? remote : null;

  return {
    target: remoteStore ? 'remote' : 'local',

    async load() {
      if (remoteStore) {
        try {
          return await remoteStore.load();
        } catch (error) {
          console.warn('⚠️ [JOURNAL] Spreadsheet unavailable, reading local file instead:', error);
        }
      }
      return local.load();
    },

    async save(records) {
      if (remoteStore) {
        try {
          return await remoteStore.save(records);
        } catch (error) {
          console.error('❌ [JOURNAL] Failed to write spreadsheet, saving to local file:', error);
        }
      }
      return local.save(records);
    },
  };
};
