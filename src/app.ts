import cors from 'cors';
import express, { type Express } from 'express';
import path from 'path';
import { sanitizeRecord, upsertRecord, type JournalRecord } from './journal/record';
import { correlate, isSeriesKey } from './stats/correlation';
import type { RecordStore } from './storage/recordStore';
import { computeWeekMetrics, renderWeek } from './timeline';
import { getDateKey, isValidDateKey } from './utils/dateUtils';

export const API_BASE_PATH = '/api';

export interface AppOptions {
  store: RecordStore;
  // Каталоги со статикой miniapp; первый должен содержать index.html
  staticDirs?: string[];
}

const readQueryString = (value: unknown): string | null => (typeof value === 'string' ? value.trim() : null);

export const createApp = ({ store, staticDirs = [] }: AppOptions): Express => {
  const app = express();

  // Записи сериализуются: load -> upsert -> save не должны перекрываться
  let writeChain: Promise<unknown> = Promise.resolve();

  const enqueueWrite = <T>(task: () => Promise<T>): Promise<T> => {
    const next = writeChain.then(task, task);
    writeChain = next.catch(() => undefined);
    return next;
  };

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  app.use(API_BASE_PATH, (_req, res, next) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  app.get(`${API_BASE_PATH}/health`, (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get(`${API_BASE_PATH}/storage`, (_req, res) => {
    res.json({ target: store.target });
  });

  app.get(`${API_BASE_PATH}/records`, async (_req, res) => {
    try {
      const records = await store.load();
      res.json({ records });
    } catch (error) {
      console.error('❌ Failed to load records:', error);
      res.status(500).json({ error: 'Failed to load records' });
    }
  });

  app.get(`${API_BASE_PATH}/records/:date`, async (req, res) => {
    const { date } = req.params;
    if (!isValidDateKey(date)) {
      res.status(400).json({ error: 'Invalid date' });
      return;
    }

    try {
      const records = await store.load();
      const record = records.find((item) => item.date === date);
      if (!record) {
        res.status(404).json({ error: 'Record not found' });
        return;
      }
      res.json({ record });
    } catch (error) {
      console.error('❌ Failed to read record:', error);
      res.status(500).json({ error: 'Failed to read record' });
    }
  });

  app.put(`${API_BASE_PATH}/records/:date`, async (req, res) => {
    const { date } = req.params;
    const record = isValidDateKey(date) ? sanitizeRecord(req.body, date) : null;
    if (!record) {
      res.status(400).json({ error: 'Invalid record' });
      return;
    }

    try {
      const { target, records } = await enqueueWrite(async () => {
        const updated: JournalRecord[] = upsertRecord(await store.load(), record);
        return { target: await store.save(updated), records: updated };
      });

      console.log(`📝 [JOURNAL] Record ${date} saved (${target})`);
      res.json({ record, target, total: records.length });
    } catch (error) {
      console.error('❌ Failed to save record:', error);
      res.status(500).json({ error: 'Failed to save record' });
    }
  });

  app.get(`${API_BASE_PATH}/week`, async (req, res) => {
    const date = readQueryString(req.query.date) || getDateKey(new Date());
    if (!isValidDateKey(date)) {
      res.status(400).json({ error: 'Invalid date' });
      return;
    }

    try {
      const records = await store.load();
      res.json({ scene: renderWeek(records, date), metrics: computeWeekMetrics(records, date) });
    } catch (error) {
      console.error('❌ Failed to render week:', error);
      res.status(500).json({ error: 'Failed to render week' });
    }
  });

  app.get(`${API_BASE_PATH}/stats/correlation`, async (req, res) => {
    const x = readQueryString(req.query.x);
    const y = readQueryString(req.query.y);
    if (!isSeriesKey(x) || !isSeriesKey(y)) {
      res.status(400).json({ error: 'Unknown series' });
      return;
    }

    try {
      res.json(correlate(await store.load(), x, y));
    } catch (error) {
      console.error('❌ Failed to compute correlation:', error);
      res.status(500).json({ error: 'Failed to compute correlation' });
    }
  });

  app.use(API_BASE_PATH, (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  if (staticDirs.length > 0) {
    staticDirs.forEach((dir) => {
      app.use(express.static(dir));
    });

    // SPA: все остальные пути отдают index.html
    app.get('*', (_req, res) => {
      res.sendFile(path.join(staticDirs[0], 'index.html'));
    });
  }

  return app;
};
