import { describe, expect, it } from 'vitest';
import { DEFAULT_HOUR_RANGE, DEFAULT_PALETTE, DEFAULT_TIMELINE_CONFIG, resolveTimelineConfig } from './config';

describe('resolveTimelineConfig', () => {
  it('returns the defaults for an empty input', () => {
    expect(resolveTimelineConfig()).toEqual(DEFAULT_TIMELINE_CONFIG);
  });

  it('keeps default colours for undefined palette entries', () => {
    const config = resolveTimelineConfig({ palette: { work: undefined, exercise: 'teal' } });

    expect(config.palette.work).toBe('red');
    expect(config.palette.exercise).toBe('teal');
  });

  it('falls back on the default range for an invalid one', () => {
    expect(resolveTimelineConfig({ visibleHourRange: [20, 8] }).visibleHourRange).toEqual([6, 24]);
  });

  it('does not share mutable state with the defaults', () => {
    const config = resolveTimelineConfig();

    expect(config.palette).not.toBe(DEFAULT_PALETTE);
    expect(Object.isFrozen(DEFAULT_TIMELINE_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PALETTE)).toBe(true);
    expect(Object.isFrozen(DEFAULT_HOUR_RANGE)).toBe(true);
    expect(Object.isFrozen(DEFAULT_TIMELINE_CONFIG.margins)).toBe(true);
  });
});
