import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createEmptyRecord, type JournalRecord } from '../journal/record';
import { createJournalStore, type RecordStore, type StorageTarget } from './recordStore';

const createMemoryStore = (target: StorageTarget, records: JournalRecord[] = []) => {
  const writes: JournalRecord[][] = [];
  return {
    target,
    writes,
    load: vi.fn(async () => records),
    save: vi.fn(async (next: readonly JournalRecord[]) => {
      writes.push([...next]);
      return target;
    }),
  };
};

const failingStore = (): RecordStore => ({
  target: 'remote',
  load: vi.fn(async () => {
    throw new Error('offline');
  }),
  save: vi.fn(async () => {
    throw new Error('offline');
  }),
});

describe('createJournalStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses only the local store when the target is local', async () => {
    const local = createMemoryStore('local');
    const remote = createMemoryStore('remote');
    const store = createJournalStore({ target: 'local', local, remote });

    expect(store.target).toBe('local');
    await expect(store.save([createEmptyRecord('2025-10-15')])).resolves.toBe('local');
    expect(remote.save).not.toHaveBeenCalled();
  });

  it('writes to the remote store when it is available', async () => {
    const local = createMemoryStore('local');
    const remote = createMemoryStore('remote');
    const store = createJournalStore({ target: 'remote', local, remote });

    await expect(store.save([createEmptyRecord('2025-10-15')])).resolves.toBe('remote');
    expect(local.save).not.toHaveBeenCalled();
  });

  it('falls back to the local file and reports where the write went', async () => {
    const local = createMemoryStore('local', [createEmptyRecord('2025-10-13')]);
    const store = createJournalStore({ target: 'remote', local, remote: failingStore() });

    await expect(store.save([createEmptyRecord('2025-10-15')])).resolves.toBe('local');
    expect(local.writes.map((records) => records.map((record) => record.date))).toEqual([['2025-10-15']]);

    const records = await store.load();
    expect(records.map((record) => record.date)).toEqual(['2025-10-13']);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('stays local when remote is requested but not configured', () => {
    const store = createJournalStore({ target: 'remote', local: createMemoryStore('local') });
    expect(store.target).toBe('local');
  });
});
