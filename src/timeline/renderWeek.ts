import type { JournalRecord } from '../journal/record';
import {
  formatColumnLabel,
  formatFullDate,
  getDateKey,
  getStartOfDay,
  getWeekDays,
  parseDateKey,
} from '../utils/dateUtils';
import { resolveTimelineConfig } from './config';
import { resolveDayIntervals } from './intervals';
import { layoutDay, placeGrid } from './layout';
import { computeDerivedMetrics, type DerivedMetrics } from './metrics';
import type { AxisTick, Scene, SceneColumn, ScenePrimitive, TimelineConfigInput } from './types';

const Y_TICK_STEP = 2;

const resolvePivot = (pivotDate: Date | string): Date => {
  if (pivotDate instanceof Date) {
    return Number.isNaN(pivotDate.getTime()) ? getStartOfDay(new Date()) : getStartOfDay(pivotDate);
  }
  return parseDateKey(pivotDate) ?? getStartOfDay(new Date());
};

/**
 * Записи недели по ключу даты. При дубликатах побеждает первая.
 */
export const selectWeekRecords = (
  records: readonly JournalRecord[],
  pivotDate: Date | string,
): { days: Date[]; byDate: Map<string, JournalRecord> } => {
  const days = getWeekDays(resolvePivot(pivotDate));
  const weekKeys = new Set(days.map(getDateKey));
  const byDate = new Map<string, JournalRecord>();

  for (const record of records) {
    if (!record || typeof record.date !== 'string' || !weekKeys.has(record.date)) {
      continue;
    }
    if (!byDate.has(record.date)) {
      byDate.set(record.date, record);
    }
  }

  return { days, byDate };
};

export const computeWeekMetrics = (
  records: readonly JournalRecord[],
  pivotDate: Date | string,
): Record<string, DerivedMetrics> => {
  const { byDate } = selectWeekRecords(records, pivotDate);
  const result: Record<string, DerivedMetrics> = {};
  byDate.forEach((record, date) => {
    result[date] = computeDerivedMetrics(record);
  });
  return result;
};

const buildYTicks = (minHour: number, maxHour: number): AxisTick[] => {
  const ticks: AxisTick[] = [];
  for (let hour = minHour; hour <= maxHour; hour += Y_TICK_STEP) {
    ticks.push({ position: hour, label: `${String(hour).padStart(2, '0')}:00` });
  }
  return ticks;
};

/**
 * Строит сцену недели (пн-вс), содержащей pivotDate. Без I/O и без исключений:
 * кривая запись даёт просто более пустую колонку.
 */
export const renderWeek = (
  records: readonly JournalRecord[],
  pivotDate: Date | string,
  configInput: TimelineConfigInput = {},
): Scene => {
  const config = resolveTimelineConfig(configInput);
  const [minHour, maxHour] = config.visibleHourRange;
  const { days, byDate } = selectWeekRecords(records, pivotDate);

  const columns: SceneColumn[] = days.map((day, dayIndex) => {
    const date = getDateKey(day);
    return { dayIndex, date, label: formatColumnLabel(day), hasRecord: byDate.has(date) };
  });

  const primitives: ScenePrimitive[] = [...placeGrid(config)];

  columns.forEach((column) => {
    const record = byDate.get(column.date);
    if (!record) {
      return;
    }
    const { intervals, lastWorkEnd } = resolveDayIntervals(record, column.dayIndex);
    const metrics = computeDerivedMetrics(record);
    primitives.push(...layoutDay(record, column.dayIndex, intervals, lastWorkEnd, metrics, config));
  });

  return {
    title: `Week of ${formatFullDate(days[0])} to ${formatFullDate(days[days.length - 1])}`,
    range: { x: [0, 7], y: [minHour, maxHour], yInverted: true },
    xTicks: columns.map((column) => ({ position: column.dayIndex + 0.5, label: column.label })),
    yTicks: buildYTicks(minHour, maxHour),
    axisLabels: { x: 'Days', y: 'Hours' },
    columns,
    primitives,
  };
};
