import { EXERCISE_NAMES, type JournalRecord } from '../journal/record';
import { parseDuration, parseTimeOfDay } from './parse';
import type { DayIntervals, Interval, IntervalCategory } from './types';

export const DEFAULT_EXERCISE_HOURS = 1;

export const WORK_MORNING_LABEL = 'Work (morning)';
export const WORK_AFTERNOON_LABEL = 'Work (afternoon)';

const makeInterval = (
  dayIndex: number,
  startHour: number | null,
  endHour: number | null,
  category: IntervalCategory,
  label: string,
): Interval | null => {
  if (startHour === null || endHour === null || endHour <= startHour) {
    return null;
  }
  return { dayIndex, startHour, endHour, category, label, colorKey: category };
};

const resolveExercise = (record: JournalRecord, dayIndex: number): Interval | null => {
  const exercise = record.exercise;
  if (!exercise || exercise.done !== true) {
    return null;
  }

  const start = parseTimeOfDay(exercise.start);
  if (start === null) {
    return null;
  }

  // Отметили «был спорт», но длительность не разобралась: рисуем час
  const parsed = parseDuration(exercise.duration);
  const duration = parsed !== null && parsed > 0 ? parsed : DEFAULT_EXERCISE_HOURS;

  const kind = exercise.kind;
  const kindName = typeof kind === 'string' && Object.hasOwn(EXERCISE_NAMES, kind) ? EXERCISE_NAMES[kind] : 'Exercise';
  const label = parsed !== null && parsed > 0 ? `${kindName} ${Math.round(parsed * 60)}min` : kindName;

  return makeInterval(dayIndex, start, start + duration, 'exercise', label);
};

/**
 * Интервалы работы и спорта за один день плюс конец последнего рабочего блока
 */
export const resolveDayIntervals = (record: JournalRecord, dayIndex: number): DayIntervals => {
  const work = record.work;
  const intervals: Interval[] = [];

  if (work) {
    const morning = makeInterval(
      dayIndex,
      parseTimeOfDay(work.start),
      parseTimeOfDay(work.lunchBreakStart),
      'work',
      WORK_MORNING_LABEL,
    );
    if (morning) {
      intervals.push(morning);
    }

    if (work.workedAfternoon === true) {
      const afternoon = makeInterval(
        dayIndex,
        parseTimeOfDay(work.afternoonResume),
        parseTimeOfDay(work.end),
        'work',
        WORK_AFTERNOON_LABEL,
      );
      if (afternoon) {
        intervals.push(afternoon);
      }
    }
  }

  const workEnds = intervals.map((interval) => interval.endHour);
  const lastWorkEnd = workEnds.length > 0 ? Math.max(...workEnds) : null;

  const exercise = resolveExercise(record, dayIndex);
  if (exercise) {
    intervals.push(exercise);
  }

  return { intervals, lastWorkEnd };
};
