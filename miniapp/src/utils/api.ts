import type { JournalRecord } from '../../../src/journal/record';
import type { CorrelationResult, SeriesKey } from '../../../src/stats/correlation';
import type { StorageTarget } from '../../../src/storage/recordStore';
import type { DerivedMetrics } from '../../../src/timeline/metrics';
import type { Scene } from '../../../src/timeline/types';

export const API_BASE_PATH = '/api';

export interface SaveRecordResult {
  record: JournalRecord;
  target: StorageTarget;
  total: number;
}

export interface WeekPayload {
  scene: Scene;
  metrics: Record<string, DerivedMetrics>;
}

export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const resolveApiBase = (): string => {
  // process есть только под Node
  const envBase = (typeof process !== 'undefined' ? (process.env.MINIAPP_API_BASE ?? '') : '').trim();
  const fallbackBase = typeof window !== 'undefined' ? window.location.origin : '';
  return (envBase || fallbackBase).replace(/\/+$/, '');
};

export const buildApiUrl = (path: string): string => {
  const base = resolveApiBase();
  return path.startsWith('/') ? `${base}${path}` : `${base}/${path}`;
};

const readErrorMessage = async (response: Response): Promise<string> => {
  try {
    const payload: unknown = await response.json();
    if (payload && typeof payload === 'object' && 'error' in payload && typeof payload.error === 'string') {
      return payload.error;
    }
  } catch (error) {
    console.warn('⚠️ Error response without JSON body:', error);
  }
  return `Request failed with status ${response.status}`;
};

const request = async <T>(path: string, init?: RequestInit): Promise<T> => {
  const response = await fetch(buildApiUrl(`${API_BASE_PATH}${path}`), {
    credentials: 'include',
    ...init,
  });

  if (!response.ok) {
    throw new ApiError(await readErrorMessage(response), response.status);
  }

  return response.json();
};

export const fetchStorageTarget = async (): Promise<StorageTarget> => {
  const payload = await request<{ target: StorageTarget }>('/storage');
  return payload.target;
};

/**
 * Все записи журнала по возрастанию даты
 */
export const fetchRecords = async (): Promise<JournalRecord[]> => {
  const payload = await request<{ records: JournalRecord[] }>('/records');
  return [...payload.records].sort((a, b) => a.date.localeCompare(b.date));
};

/**
 * Запись за дату или null, если её ещё нет
 */
export const fetchRecord = async (date: string): Promise<JournalRecord | null> => {
  try {
    const payload = await request<{ record: JournalRecord }>(`/records/${encodeURIComponent(date)}`);
    return payload.record;
  } catch (error) {
    if (error instanceof ApiError && error.status === 404) {
      return null;
    }
    throw error;
  }
};

export const saveRecord = (record: JournalRecord): Promise<SaveRecordResult> =>
  request<SaveRecordResult>(`/records/${encodeURIComponent(record.date)}`, {
    method: 'PUT',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(record),
  });

export const fetchWeek = (date: string): Promise<WeekPayload> =>
  request<WeekPayload>(`/week?date=${encodeURIComponent(date)}`);

export const fetchCorrelation = (x: SeriesKey, y: SeriesKey): Promise<CorrelationResult> =>
  request<CorrelationResult>(`/stats/correlation?x=${encodeURIComponent(x)}&y=${encodeURIComponent(y)}`);
