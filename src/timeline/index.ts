export { parseDuration, parseTimeOfDay } from './parse';
export { avgEfficacy, computeDerivedMetrics, sleepHours, workHours } from './metrics';
export type { DerivedMetrics } from './metrics';
export { resolveDayIntervals } from './intervals';
export { DEFAULT_TIMELINE_CONFIG, resolveTimelineConfig } from './config';
export { computeWeekMetrics, renderWeek, selectWeekRecords } from './renderWeek';
export type * from './types';
