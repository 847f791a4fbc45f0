import type { JournalRecord } from '../journal/record';
import { computeDerivedMetrics } from '../timeline/metrics';

export const SERIES_KEYS = [
  'sleepHours',
  'workHours',
  'avgEfficacy',
  'difficulty',
  'patientsTotal',
  'patientsNew',
  'efficacyMorning',
  'efficacyMidday',
  'efficacyAfternoon',
] as const;

export type SeriesKey = (typeof SERIES_KEYS)[number];

export const SERIES_NAMES: Record<SeriesKey, string> = {
  sleepHours: 'Sleep (h)',
  workHours: 'Work (h)',
  avgEfficacy: 'Average efficacy',
  difficulty: 'Day difficulty',
  patientsTotal: 'Patients seen',
  patientsNew: 'New patients',
  efficacyMorning: 'Efficacy (morning)',
  efficacyMidday: 'Efficacy (midday)',
  efficacyAfternoon: 'Efficacy (afternoon)',
};

export interface SeriesPoint {
  date: string;
  value: number | null;
}

export interface PairedPoint {
  date: string;
  x: number;
  y: number;
}

export interface LinearFit {
  slope: number;
  intercept: number;
}

export interface CorrelationResult {
  x: SeriesKey;
  y: SeriesKey;
  points: PairedPoint[];
  count: number;
  pearson: number | null;
  fit: LinearFit | null;
}

export const isSeriesKey = (value: unknown): value is SeriesKey =>
  typeof value === 'string' && SERIES_KEYS.some((key) => key === value);

const readSeriesValue = (record: JournalRecord, key: SeriesKey): number | null => {
  switch (key) {
    case 'sleepHours':
    case 'workHours':
    case 'avgEfficacy':
      return computeDerivedMetrics(record)[key];
    case 'difficulty':
      return record.dayRating.difficulty;
    case 'patientsTotal':
      return record.work.patientsTotal;
    case 'patientsNew':
      return record.work.patientsNew;
    case 'efficacyMorning':
      return record.doses[0].efficacy;
    case 'efficacyMidday':
      return record.doses[1].efficacy;
    case 'efficacyAfternoon':
      return record.doses[2].efficacy;
    default:
      return null;
  }
};

export const extractSeries = (records: readonly JournalRecord[], key: SeriesKey): SeriesPoint[] =>
  [...records]
    .sort((a, b) => a.date.localeCompare(b.date))
    .map((record) => ({ date: record.date, value: readSeriesValue(record, key) }));

/**
 * Пары (x, y) только по датам, где заданы обе величины
 */
export const pairSeries = (records: readonly JournalRecord[], x: SeriesKey, y: SeriesKey): PairedPoint[] => {
  const xs = extractSeries(records, x);
  const ys = extractSeries(records, y);
  const points: PairedPoint[] = [];

  xs.forEach((point, index) => {
    const other = ys[index].value;
    if (point.value !== null && other !== null) {
      points.push({ date: point.date, x: point.value, y: other });
    }
  });

  return points;
};

const mean = (values: readonly number[]) => values.reduce((sum, value) => sum + value, 0) / values.length;

export const pearson = (xs: readonly number[], ys: readonly number[]): number | null => {
  if (xs.length !== ys.length || xs.length < 2) {
    return null;
  }

  const meanX = mean(xs);
  const meanY = mean(ys);
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;

  for (let i = 0; i < xs.length; i += 1) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return null;
  }

  return covariance / Math.sqrt(varianceX * varianceY);
};

/**
 * Метод наименьших квадратов: y = slope * x + intercept
 */
export const linearFit = (xs: readonly number[], ys: readonly number[]): LinearFit | null => {
  if (xs.length !== ys.length || xs.length < 2) {
    return null;
  }

  const meanX = mean(xs);
  const meanY = mean(ys);
  let numerator = 0;
  let denominator = 0;

  for (let i = 0; i < xs.length; i += 1) {
    numerator += (xs[i] - meanX) * (ys[i] - meanY);
    denominator += (xs[i] - meanX) ** 2;
  }

  if (denominator === 0) {
    return null;
  }

  const slope = numerator / denominator;
  return { slope, intercept: meanY - slope * meanX };
};

export const correlate = (records: readonly JournalRecord[], x: SeriesKey, y: SeriesKey): CorrelationResult => {
  const points = pairSeries(records, x, y);
  const xs = points.map((point) => point.x);
  const ys = points.map((point) => point.y);

  return {
    x,
    y,
    points,
    count: points.length,
    pearson: pearson(xs, ys),
    fit: linearFit(xs, ys),
  };
};
