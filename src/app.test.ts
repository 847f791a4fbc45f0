import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import { createEmptyRecord, type JournalRecord } from './journal/record';
import type { RecordStore } from './storage/recordStore';

const createMemoryStore = (initial: JournalRecord[] = []): RecordStore => {
  let records = [...initial];
  return {
    target: 'local',
    async load() {
      return [...records];
    },
    async save(next) {
      records = [...next];
      return 'local';
    },
  };
};

const brokenStore: RecordStore = {
  target: 'remote',
  load: async () => {
    throw new Error('disk unavailable');
  },
  save: async () => {
    throw new Error('disk unavailable');
  },
};

describe('HTTP API', () => {
  let server: Server | null = null;
  let baseUrl = '';

  const start = async (store: RecordStore) => {
    const app = createApp({ store });
    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api`;
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>((resolve, reject) => {
        running.close((error) => (error ? reject(error) : resolve()));
      });
    }
  });

  it('reports health and storage target without caching', async () => {
    await start(createMemoryStore());

    const health = await fetch(`${baseUrl}/health`);
    expect(health.headers.get('cache-control')).toBe('no-store');
    expect(await health.json()).toEqual({ status: 'ok' });

    const storage = await fetch(`${baseUrl}/storage`);
    expect(await storage.json()).toEqual({ target: 'local' });
  });

  it('round-trips a record through PUT and GET', async () => {
    await start(createMemoryStore([createEmptyRecord('2025-10-13')]));

    const put = await fetch(`${baseUrl}/records/2025-10-15`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ date: '1999-01-01', sleep: { duration: '7h' }, dayRating: { difficulty: 5 } }),
    });
    const saved = await put.json();

    expect(put.status).toBe(200);
    expect(saved.target).toBe('local');
    expect(saved.total).toBe(2);
    expect(saved.record.date).toBe('2025-10-15');

    const get = await fetch(`${baseUrl}/records/2025-10-15`);
    const body = await get.json();
    expect(body.record.sleep.duration).toBe('7h');
    expect(body.record.dayRating.difficulty).toBe(5);

    const list = await (await fetch(`${baseUrl}/records`)).json();
    expect(list.records.map((record: JournalRecord) => record.date)).toEqual(['2025-10-13', '2025-10-15']);
  });

  it('rejects malformed dates and answers 404 for missing records', async () => {
    await start(createMemoryStore());

    expect((await fetch(`${baseUrl}/records/2025-02-30`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/records/2025-10-15`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/week?date=15-10-2025`)).status).toBe(400);
    expect((await fetch(`${baseUrl}/records/bad`, { method: 'PUT' })).status).toBe(400);
  });

  it('renders the week around a date', async () => {
    const record = createEmptyRecord('2025-10-15');
    record.sleep.duration = '8h';
    await start(createMemoryStore([record]));

    const body = await (await fetch(`${baseUrl}/week?date=2025-10-15`)).json();

    expect(body.scene.title).toBe('Week of 13/10/2025 to 19/10/2025');
    expect(body.scene.columns[2]).toEqual({ dayIndex: 2, date: '2025-10-15', label: 'Wed 15/10', hasRecord: true });
    expect(body.metrics).toEqual({ '2025-10-15': { sleepHours: 8, workHours: null, avgEfficacy: null } });
  });

  it('computes correlations and validates series names', async () => {
    const records = ['2025-10-13', '2025-10-14', '2025-10-15'].map((date, index) => {
      const record = createEmptyRecord(date);
      record.sleep.duration = `${8 - index}h`;
      record.dayRating.difficulty = 2 + index * 2;
      return record;
    });
    await start(createMemoryStore(records));

    const result = await (await fetch(`${baseUrl}/stats/correlation?x=sleepHours&y=difficulty`)).json();
    expect(result.count).toBe(3);
    expect(result.pearson).toBeCloseTo(-1);

    expect((await fetch(`${baseUrl}/stats/correlation?x=sleepHours&y=mood`)).status).toBe(400);
  });

  it('answers 500 when the store fails', async () => {
    await start(brokenStore);

    const response = await fetch(`${baseUrl}/records`);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Failed to load records' });
  });
});
