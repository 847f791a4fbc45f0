import type { DoseEvent, JournalRecord } from '../journal/record';
import { parseDuration, parseTimeOfDay } from './parse';

export interface DerivedMetrics {
  sleepHours: number | null;
  workHours: number | null;
  avgEfficacy: number | null;
}

// Отрезок считается только при end > start, иначе 0
const spanLength = (start: unknown, end: unknown): number => {
  const from = parseTimeOfDay(start);
  const to = parseTimeOfDay(end);
  if (from === null || to === null || to <= from) {
    return 0;
  }
  return to - from;
};

export const sleepHours = (record: JournalRecord): number | null => parseDuration(record.sleep?.duration);

/**
 * Утро (начало -> обед) плюс, если работали после обеда, (возобновление -> конец).
 * Ноль часов неотличим от отсутствия данных, поэтому возвращается null.
 */
export const workHours = (record: JournalRecord): number | null => {
  const work = record.work;
  if (!work) {
    return null;
  }

  let total = spanLength(work.start, work.lunchBreakStart);
  if (work.workedAfternoon === true) {
    total += spanLength(work.afternoonResume, work.end);
  }

  return total > 0 ? total : null;
};

export const avgEfficacy = (record: JournalRecord): number | null => {
  const doses: DoseEvent[] = Array.isArray(record.doses) ? record.doses : [];
  const values = doses
    .map((dose) => dose?.efficacy)
    .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));

  if (values.length === 0) {
    return null;
  }

  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const computeDerivedMetrics = (record: JournalRecord): DerivedMetrics => ({
  sleepHours: sleepHours(record),
  workHours: workHours(record),
  avgEfficacy: avgEfficacy(record),
});
