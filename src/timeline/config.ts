import type { ColumnMargins, TimelineConfig, TimelineConfigInput, TimelinePalette } from './types';

export const DEFAULT_HOUR_RANGE: readonly [number, number] = Object.freeze([6, 24] as const);

export const DEFAULT_MARGINS: Readonly<ColumnMargins> = Object.freeze({
  block: 0.08,
  dose: 0.1,
  cartouche: 0.14,
  text: 0.06,
});

export const DEFAULT_PALETTE: Readonly<TimelinePalette> = Object.freeze({
  work: 'red',
  exercise: 'green',
  dose: 'blue',
  doseText: 'white',
  text: 'black',
  grid: '#1f77b4',
  noteFill: 'white',
  noteStroke: 'black',
});

const PALETTE_KEYS = Object.keys(DEFAULT_PALETTE).filter((key): key is keyof TimelinePalette => key in DEFAULT_PALETTE);

export const DEFAULT_TIMELINE_CONFIG: TimelineConfig = Object.freeze({
  visibleHourRange: DEFAULT_HOUR_RANGE,
  margins: DEFAULT_MARGINS,
  palette: DEFAULT_PALETTE,
});

const sanitizeHourRange = (input: unknown): readonly [number, number] => {
  if (!Array.isArray(input) || input.length !== 2) {
    return DEFAULT_HOUR_RANGE;
  }
  const [min, max] = input;
  if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max > 24 || min >= max) {
    return DEFAULT_HOUR_RANGE;
  }
  return [min, max];
};

// Пропущенные и undefined-цвета берутся из палитры по умолчанию
const mergePalette = (input: Partial<TimelinePalette> = {}): TimelinePalette => {
  const palette: TimelinePalette = { ...DEFAULT_PALETTE };
  PALETTE_KEYS.forEach((key) => {
    const color = input[key];
    if (typeof color === 'string' && color.trim().length > 0) {
      palette[key] = color;
    }
  });
  return palette;
};

const sanitizeMargin = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 && value < 0.5 ? value : fallback;

/**
 * Собирает конфигурацию рендера из частичной. Некорректные значения заменяются дефолтами.
 */
export const resolveTimelineConfig = (input: TimelineConfigInput = {}): TimelineConfig => {
  const margins = input.margins ?? {};
  return {
    visibleHourRange: sanitizeHourRange(input.visibleHourRange),
    margins: {
      block: sanitizeMargin(margins.block, DEFAULT_MARGINS.block),
      dose: sanitizeMargin(margins.dose, DEFAULT_MARGINS.dose),
      cartouche: sanitizeMargin(margins.cartouche, DEFAULT_MARGINS.cartouche),
      text: sanitizeMargin(margins.text, DEFAULT_MARGINS.text),
    },
    palette: mergePalette(input.palette),
  };
};
