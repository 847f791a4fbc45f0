import { isValidDateKey } from '../utils/dateUtils';

export type DoseSlot = 'morning' | 'midday' | 'afternoon';

export type DoseMg = 10 | 20 | 30;

export type ExerciseKind = 'strength' | 'swimming' | 'running' | 'volleyball' | 'other';

export const DOSE_SLOTS: readonly DoseSlot[] = ['morning', 'midday', 'afternoon'];

export const DOSE_VALUES: readonly DoseMg[] = [10, 20, 30];

export const EXERCISE_KINDS: readonly ExerciseKind[] = ['strength', 'swimming', 'running', 'volleyball', 'other'];

export const EXERCISE_NAMES: Record<ExerciseKind, string> = {
  strength: 'Strength',
  swimming: 'Swimming',
  running: 'Running',
  volleyball: 'Volleyball',
  other: 'Other',
};

/**
 * Приём препарата в одном из трёх слотов дня
 */
export interface DoseEvent {
  slot: DoseSlot;
  time: string | null;
  doseMg: DoseMg | null;
  efficacy: number | null; // 0-10
  note: string;
  sideEffects: string;
}

export interface SleepEntry {
  bedtime: string | null;
  duration: string | null; // "7h45"
}

export interface WorkEntry {
  start: string | null;
  lunchBreakStart: string | null;
  workedAfternoon: boolean;
  afternoonResume: string | null;
  end: string | null;
  patientsTotal: number;
  patientsNew: number;
}

export interface ExerciseEntry {
  done: boolean;
  kind: ExerciseKind | null;
  start: string | null;
  duration: string | null; // "45min" / "1h15"
}

export interface DayRating {
  difficulty: number | null; // 0-10
  comment: string;
}

/**
 * Запись журнала за один календарный день
 */
export interface JournalRecord {
  date: string; // YYYY-MM-DD
  sleep: SleepEntry;
  doses: [DoseEvent, DoseEvent, DoseEvent];
  work: WorkEntry;
  exercise: ExerciseEntry;
  dayRating: DayRating;
}

/**
 * Колонки плоской таблицы (файл или онлайн-таблица)
 */
export const COLUMNS = [
  'date',
  'bedtime',
  'sleep_duration',
  'dose_morning_time',
  'dose_morning_mg',
  'efficacy_morning',
  'note_morning',
  'side_effects_morning',
  'dose_midday_time',
  'dose_midday_mg',
  'efficacy_midday',
  'note_midday',
  'side_effects_midday',
  'dose_afternoon_time',
  'dose_afternoon_mg',
  'efficacy_afternoon',
  'note_afternoon',
  'side_effects_afternoon',
  'work_start',
  'lunch_break_start',
  'worked_afternoon',
  'afternoon_resume',
  'work_end',
  'patients_total',
  'patients_new',
  'exercise_done',
  'exercise_kind',
  'exercise_start',
  'exercise_duration',
  'day_difficulty',
  'comment',
] as const;

export type ColumnName = (typeof COLUMNS)[number];

export type FlatRow = Record<ColumnName, string>;

const createEmptyDose = (slot: DoseSlot): DoseEvent => ({
  slot,
  time: null,
  doseMg: null,
  efficacy: null,
  note: '',
  sideEffects: '',
});

export const createEmptyRecord = (date: string): JournalRecord => ({
  date,
  sleep: { bedtime: null, duration: null },
  doses: [createEmptyDose('morning'), createEmptyDose('midday'), createEmptyDose('afternoon')],
  work: {
    start: null,
    lunchBreakStart: null,
    workedAfternoon: false,
    afternoonResume: null,
    end: null,
    patientsTotal: 0,
    patientsNew: 0,
  },
  exercise: { done: false, kind: null, start: null, duration: null },
  dayRating: { difficulty: null, comment: '' },
});

const isObject = (value: unknown): value is Record<string, unknown> => !!value && typeof value === 'object';

const sanitizeOptionalText = (value: unknown): string | null => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const sanitizeText = (value: unknown): string => (typeof value === 'string' ? value : '');

const parseInteger = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  // "20.0" приходит из таблиц, где числа хранились как float
  if (!/^[+-]?\d+(\.0+)?$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
};

const sanitizeScore = (value: unknown): number | null => {
  const parsed = parseInteger(value);
  if (parsed === null || parsed < 0 || parsed > 10) {
    return null;
  }
  return parsed;
};

const sanitizeCount = (value: unknown): number => {
  const parsed = parseInteger(value);
  return parsed !== null && parsed > 0 ? parsed : 0;
};

const sanitizeDoseMg = (value: unknown): DoseMg | null => {
  const parsed = parseInteger(value);
  return DOSE_VALUES.find((dose) => dose === parsed) ?? null;
};

export const parseFlag = (value: unknown): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value === 1;
  }
  if (typeof value !== 'string') {
    return false;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
};

const sanitizeExerciseKind = (value: unknown): ExerciseKind | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  return EXERCISE_KINDS.find((kind) => kind === normalized) ?? null;
};

const sanitizeDose = (input: unknown, slot: DoseSlot): DoseEvent => {
  if (!isObject(input)) {
    return createEmptyDose(slot);
  }
  return {
    slot,
    time: sanitizeOptionalText(input.time),
    doseMg: sanitizeDoseMg(input.doseMg),
    efficacy: sanitizeScore(input.efficacy),
    note: sanitizeText(input.note),
    sideEffects: sanitizeText(input.sideEffects),
  };
};

const sanitizeDoses = (input: unknown): JournalRecord['doses'] => {
  const source = Array.isArray(input) ? input : [];
  // Слот определяется позицией, а не полем slot из входных данных
  return [sanitizeDose(source[0], 'morning'), sanitizeDose(source[1], 'midday'), sanitizeDose(source[2], 'afternoon')];
};

/**
 * Приводит произвольный JSON к записи журнала. Неверные поля становятся пустыми.
 * Возвращает null, если нет корректной даты.
 */
export const sanitizeRecord = (input: unknown, dateOverride?: string): JournalRecord | null => {
  if (!isObject(input)) {
    return null;
  }

  const date = dateOverride ?? (typeof input.date === 'string' ? input.date.trim() : '');
  if (!isValidDateKey(date)) {
    return null;
  }

  const sleep: Record<string, unknown> = isObject(input.sleep) ? input.sleep : {};
  const work: Record<string, unknown> = isObject(input.work) ? input.work : {};
  const exercise: Record<string, unknown> = isObject(input.exercise) ? input.exercise : {};
  const dayRating: Record<string, unknown> = isObject(input.dayRating) ? input.dayRating : {};

  return {
    date,
    sleep: {
      bedtime: sanitizeOptionalText(sleep.bedtime),
      duration: sanitizeOptionalText(sleep.duration),
    },
    doses: sanitizeDoses(input.doses),
    work: {
      start: sanitizeOptionalText(work.start),
      lunchBreakStart: sanitizeOptionalText(work.lunchBreakStart),
      workedAfternoon: parseFlag(work.workedAfternoon),
      afternoonResume: sanitizeOptionalText(work.afternoonResume),
      end: sanitizeOptionalText(work.end),
      patientsTotal: sanitizeCount(work.patientsTotal),
      patientsNew: sanitizeCount(work.patientsNew),
    },
    exercise: {
      done: parseFlag(exercise.done),
      kind: sanitizeExerciseKind(exercise.kind),
      start: sanitizeOptionalText(exercise.start),
      duration: sanitizeOptionalText(exercise.duration),
    },
    dayRating: {
      difficulty: sanitizeScore(dayRating.difficulty),
      comment: sanitizeText(dayRating.comment),
    },
  };
};

const cell = (value: string | number | boolean | null): string => (value === null ? '' : String(value));

export const recordToRow = (record: JournalRecord): FlatRow => {
  const [morning, midday, afternoon] = record.doses;
  return {
    date: record.date,
    bedtime: cell(record.sleep.bedtime),
    sleep_duration: cell(record.sleep.duration),
    dose_morning_time: cell(morning.time),
    dose_morning_mg: cell(morning.doseMg),
    efficacy_morning: cell(morning.efficacy),
    note_morning: morning.note,
    side_effects_morning: morning.sideEffects,
    dose_midday_time: cell(midday.time),
    dose_midday_mg: cell(midday.doseMg),
    efficacy_midday: cell(midday.efficacy),
    note_midday: midday.note,
    side_effects_midday: midday.sideEffects,
    dose_afternoon_time: cell(afternoon.time),
    dose_afternoon_mg: cell(afternoon.doseMg),
    efficacy_afternoon: cell(afternoon.efficacy),
    note_afternoon: afternoon.note,
    side_effects_afternoon: afternoon.sideEffects,
    work_start: cell(record.work.start),
    lunch_break_start: cell(record.work.lunchBreakStart),
    worked_afternoon: cell(record.work.workedAfternoon),
    afternoon_resume: cell(record.work.afternoonResume),
    work_end: cell(record.work.end),
    patients_total: cell(record.work.patientsTotal),
    patients_new: cell(record.work.patientsNew),
    exercise_done: cell(record.exercise.done),
    exercise_kind: cell(record.exercise.kind),
    exercise_start: cell(record.exercise.start),
    exercise_duration: cell(record.exercise.duration),
    day_difficulty: cell(record.dayRating.difficulty),
    comment: record.dayRating.comment,
  };
};

export const rowToValues = (row: FlatRow): string[] => COLUMNS.map((column) => row[column]);

export type RowReader = (column: ColumnName) => string;

/**
 * Читает ячейки строки по заголовку таблицы. Отсутствующие колонки становятся пустыми.
 */
export const createRowReader = (header: readonly string[], values: readonly unknown[]): RowReader => (column) => {
  const index = header.indexOf(column);
  const value = index >= 0 ? values[index] : undefined;
  return value === undefined || value === null ? '' : String(value);
};

export const readRecord = (read: RowReader): JournalRecord | null =>
  sanitizeRecord({
    date: read('date'),
    sleep: { bedtime: read('bedtime'), duration: read('sleep_duration') },
    doses: DOSE_SLOTS.map((slot) => ({
      time: read(`dose_${slot}_time`),
      doseMg: read(`dose_${slot}_mg`),
      efficacy: read(`efficacy_${slot}`),
      note: read(`note_${slot}`),
      sideEffects: read(`side_effects_${slot}`),
    })),
    work: {
      start: read('work_start'),
      lunchBreakStart: read('lunch_break_start'),
      workedAfternoon: read('worked_afternoon'),
      afternoonResume: read('afternoon_resume'),
      end: read('work_end'),
      patientsTotal: read('patients_total'),
      patientsNew: read('patients_new'),
    },
    exercise: {
      done: read('exercise_done'),
      kind: read('exercise_kind'),
      start: read('exercise_start'),
      duration: read('exercise_duration'),
    },
    dayRating: { difficulty: read('day_difficulty'), comment: read('comment') },
  });

/**
 * Вставляет или заменяет запись по дате. Результат отсортирован по дате.
 */
export const upsertRecord = (records: readonly JournalRecord[], record: JournalRecord): JournalRecord[] => {
  const next = records.filter((existing) => existing.date !== record.date);
  next.push(record);
  return next.sort((a, b) => a.date.localeCompare(b.date));
};
