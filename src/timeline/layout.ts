import { DOSE_SLOTS, type DoseEvent, type DoseSlot, type JournalRecord } from '../journal/record';
import type { DerivedMetrics } from './metrics';
import { parseTimeOfDay } from './parse';
import type { FilledRect, Interval, Line, PointTag, ScenePrimitive, TextBox, TimelineConfig } from './types';

export const MIN_BLOCK_HEIGHT = 0.06;
export const DOSE_TAG_WIDTH_RATIO = 0.28;
export const DOSE_TAG_HEIGHT = 0.6;
export const DOSE_LINE_GAP = 0.01;
export const NOTE_HEIGHT = 0.9;
export const NOTE_MAX_LENGTH = 140;
export const SIDE_EFFECTS_MAX_LENGTH = 40;
export const COMMENT_MAX_LENGTH = 50;
export const PATIENTS_OFFSET = 0.6;
export const PATIENTS_BOTTOM_PADDING = 0.4;
export const SUMMARY_BOTTOM_PADDING = 0.2;
export const SUMMARY_LINE_SPACING = 0.45;
export const PLACEHOLDER_MISSING = 'n/d';
export const PLACEHOLDER_EMPTY = '—';
export const PLACEHOLDER_NO_WORK = '0 h';

export const NOTE_ANCHORS: Record<DoseSlot, number> = {
  morning: 10.5,
  midday: 15.0,
  afternoon: 20.5,
};

export interface DoseMarker {
  line: Line;
  tag: PointTag;
}

const BLOCK_OPACITY: Record<Interval['category'], number> = {
  work: 0.3,
  exercise: 0.22,
};

export const truncateText = (text: string, maxLength: number): string =>
  text.length > maxLength ? `${text.slice(0, maxLength)}…` : text;

const isBlank = (value: unknown): boolean => typeof value !== 'string' || value.trim().length === 0;

export const formatDoseLabel = (dose: unknown): string => {
  if (dose === null || dose === undefined) {
    return 'dose';
  }
  const text = String(dose).trim();
  return text ? `${text} mg` : 'dose';
};

/**
 * Вертикальные линии на границах дней и горизонтальные на каждом целом часе
 */
export const placeGrid = (config: TimelineConfig): Line[] => {
  const [minHour, maxHour] = config.visibleHourRange;
  const lines: Line[] = [];

  for (let x = 0; x <= 7; x += 1) {
    lines.push({
      kind: 'line',
      role: 'grid',
      dayIndex: null,
      x1: x,
      y1: minHour,
      x2: x,
      y2: maxHour,
      color: config.palette.grid,
      width: 1,
      style: 'dashed',
      opacity: 0.25,
    });
  }

  for (let hour = minHour; hour <= maxHour; hour += 1) {
    lines.push({
      kind: 'line',
      role: 'grid',
      dayIndex: null,
      x1: 0,
      y1: hour,
      x2: 7,
      y2: hour,
      color: config.palette.grid,
      width: 1,
      style: 'dotted',
      opacity: 0.07,
    });
  }

  return lines;
};

export const placeIntervalBlock = (interval: Interval, config: TimelineConfig): [FilledRect, TextBox] => {
  const margin = config.margins.block;
  const color = config.palette[interval.colorKey];
  const x0 = interval.dayIndex + margin;
  const x1 = interval.dayIndex + 1 - margin;

  return [
    {
      kind: 'rect',
      role: interval.category,
      dayIndex: interval.dayIndex,
      x: x0,
      y: interval.startHour,
      width: x1 - x0,
      height: Math.max(MIN_BLOCK_HEIGHT, interval.endHour - interval.startHour),
      fill: color,
      stroke: color,
      opacity: BLOCK_OPACITY[interval.category],
    },
    {
      kind: 'text',
      role: interval.category,
      dayIndex: interval.dayIndex,
      x: (x0 + x1) / 2,
      y: (interval.startHour + interval.endHour) / 2,
      text: interval.label,
      color,
      fontSize: 9,
      anchor: 'middle',
      baseline: 'middle',
      frame: null,
    },
  ];
};

/**
 * Линия-засечка и плашка с дозой справа. Без времени приёма ничего не рисуется.
 */
export const placeDoseMarker = (
  dayIndex: number,
  hour: number | null,
  dose: unknown,
  config: TimelineConfig,
): DoseMarker | null => {
  if (hour === null) {
    return null;
  }

  const margin = config.margins.dose;
  const x0 = dayIndex + margin;
  const x1 = dayIndex + 1 - margin;
  const tagWidth = (x1 - x0) * DOSE_TAG_WIDTH_RATIO;

  return {
    line: {
      kind: 'line',
      role: 'dose',
      dayIndex,
      x1: x0,
      y1: hour,
      x2: x1 - tagWidth - DOSE_LINE_GAP,
      y2: hour,
      color: config.palette.dose,
      width: 2,
      style: 'solid',
      opacity: 1,
    },
    tag: {
      kind: 'tag',
      role: 'dose',
      dayIndex,
      x: x1 - tagWidth,
      y: hour,
      width: tagWidth,
      height: DOSE_TAG_HEIGHT,
      fill: config.palette.dose,
      text: formatDoseLabel(dose),
      textColor: config.palette.doseText,
      fontSize: 8,
    },
  };
};

const toCount = (value: unknown): number => (typeof value === 'number' && Number.isFinite(value) ? value : 0);

export const placePatientCount = (
  dayIndex: number,
  lastWorkEnd: number | null,
  work: JournalRecord['work'] | undefined,
  config: TimelineConfig,
): TextBox | null => {
  if (lastWorkEnd === null) {
    return null;
  }

  const maxHour = config.visibleHourRange[1];
  return {
    kind: 'text',
    role: 'patients',
    dayIndex,
    x: dayIndex + config.margins.text,
    y: Math.min(maxHour - PATIENTS_BOTTOM_PADDING, lastWorkEnd + PATIENTS_OFFSET),
    text: `👥 Patients: ${toCount(work?.patientsTotal)} (new: ${toCount(work?.patientsNew)})`,
    color: config.palette.text,
    fontSize: 9,
    anchor: 'start',
    baseline: 'bottom',
    frame: null,
  };
};

export const placeNoteCartouche = (
  dayIndex: number,
  note: unknown,
  anchorHour: number,
  config: TimelineConfig,
): TextBox | null => {
  if (typeof note !== 'string' || isBlank(note)) {
    return null;
  }

  const margin = config.margins.cartouche;
  const x0 = dayIndex + margin;
  const x1 = dayIndex + 1 - margin;

  return {
    kind: 'text',
    role: 'note',
    dayIndex,
    x: (x0 + x1) / 2,
    y: anchorHour,
    text: truncateText(note, NOTE_MAX_LENGTH),
    color: config.palette.text,
    fontSize: 8,
    anchor: 'middle',
    baseline: 'middle',
    frame: {
      x: x0,
      y: anchorHour - NOTE_HEIGHT / 2,
      width: x1 - x0,
      height: NOTE_HEIGHT,
      fill: config.palette.noteFill,
      stroke: config.palette.noteStroke,
      strokeWidth: 0.7,
      opacity: 0.9,
    },
  };
};

const textOrPlaceholder = (value: unknown, maxLength: number): string =>
  typeof value === 'string' && !isBlank(value) ? truncateText(value.trim(), maxLength) : PLACEHOLDER_EMPTY;

/**
 * Три строки итога дня. Строка с пустым источником показывает заглушку, но не пропускается.
 */
export const buildSummaryLines = (record: JournalRecord, metrics: DerivedMetrics): [string, string, string] => {
  const sleepText = isBlank(record.sleep?.duration) ? PLACEHOLDER_MISSING : String(record.sleep.duration).trim();
  const workText = metrics.workHours !== null ? `${metrics.workHours.toFixed(1)} h` : PLACEHOLDER_NO_WORK;
  const difficulty = record.dayRating?.difficulty;
  const difficultyText = typeof difficulty === 'number' ? `${difficulty}/10` : PLACEHOLDER_MISSING;

  const doses: DoseEvent[] = Array.isArray(record.doses) ? record.doses : [];
  const sideEffects = doses
    .map((dose) => dose?.sideEffects)
    .filter((text): text is string => typeof text === 'string' && !isBlank(text))
    .map((text) => text.trim())
    .join(' / ');

  return [
    `😴 ${sleepText} · 💼 ${workText} · 🔥 ${difficultyText}`,
    textOrPlaceholder(sideEffects, SIDE_EFFECTS_MAX_LENGTH),
    textOrPlaceholder(record.dayRating?.comment, COMMENT_MAX_LENGTH),
  ];
};

export const placeSummaryBandeau = (
  dayIndex: number,
  record: JournalRecord,
  metrics: DerivedMetrics,
  config: TimelineConfig,
): TextBox[] => {
  const baseline = config.visibleHourRange[1] - SUMMARY_BOTTOM_PADDING;
  const lines = buildSummaryLines(record, metrics);

  return lines.map((text, index): TextBox => ({
    kind: 'text',
    role: 'summary',
    dayIndex,
    x: dayIndex + config.margins.text,
    y: baseline - (lines.length - 1 - index) * SUMMARY_LINE_SPACING,
    text,
    color: config.palette.text,
    fontSize: 8,
    anchor: 'start',
    baseline: 'bottom',
    frame: null,
  }));
};

/**
 * Все примитивы одной колонки в порядке отрисовки:
 * блоки (работа, пациенты, спорт) -> дозы -> заметки -> итог дня
 */
export const layoutDay = (
  record: JournalRecord,
  dayIndex: number,
  intervals: Interval[],
  lastWorkEnd: number | null,
  metrics: DerivedMetrics,
  config: TimelineConfig,
): ScenePrimitive[] => {
  const primitives: ScenePrimitive[] = [];

  intervals
    .filter((interval) => interval.category === 'work')
    .forEach((interval) => primitives.push(...placeIntervalBlock(interval, config)));

  const patients = placePatientCount(dayIndex, lastWorkEnd, record.work, config);
  if (patients) {
    primitives.push(patients);
  }

  intervals
    .filter((interval) => interval.category === 'exercise')
    .forEach((interval) => primitives.push(...placeIntervalBlock(interval, config)));

  const doses: DoseEvent[] = Array.isArray(record.doses) ? record.doses : [];
  doses.forEach((dose) => {
    const marker = placeDoseMarker(dayIndex, parseTimeOfDay(dose?.time), dose?.doseMg, config);
    if (marker) {
      primitives.push(marker.line, marker.tag);
    }
  });

  // Якорь заметки определяется позицией дозы, а не полем slot
  doses.slice(0, DOSE_SLOTS.length).forEach((dose, index) => {
    if (!dose) {
      return;
    }
    const anchor = NOTE_ANCHORS[DOSE_SLOTS[index]];
    const cartouche = placeNoteCartouche(dayIndex, dose.note, anchor, config);
    if (cartouche) {
      primitives.push(cartouche);
    }
  });

  primitives.push(...placeSummaryBandeau(dayIndex, record, metrics, config));

  return primitives;
};
