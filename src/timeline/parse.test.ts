import { describe, expect, it } from 'vitest';
import { parseDuration, parseTimeOfDay } from './parse';

describe('parseTimeOfDay', () => {
  it('converts HH:MM into fractional hours', () => {
    expect(parseTimeOfDay('09:00')).toBe(9);
    expect(parseTimeOfDay('12:30')).toBe(12.5);
    expect(parseTimeOfDay('23:45')).toBe(23.75);
    expect(parseTimeOfDay('0:15')).toBe(0.25);
  });

  it('ignores seconds', () => {
    expect(parseTimeOfDay('08:00:00')).toBe(8);
    expect(parseTimeOfDay('16:30:59')).toBe(16.5);
  });

  it('matches HH + MM/60 for every minute of the day', () => {
    for (let hour = 0; hour < 24; hour += 1) {
      for (let minute = 0; minute < 60; minute += 1) {
        const text = `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
        expect(parseTimeOfDay(text)).toBe(hour + minute / 60);
      }
    }
  });

  it('returns null for malformed input', () => {
    expect(parseTimeOfDay('')).toBeNull();
    expect(parseTimeOfDay('9h30')).toBeNull();
    expect(parseTimeOfDay('nine:thirty')).toBeNull();
    expect(parseTimeOfDay('12:')).toBeNull();
    expect(parseTimeOfDay('12.5:00')).toBeNull();
  });

  it('returns null for non-string values', () => {
    expect(parseTimeOfDay(null)).toBeNull();
    expect(parseTimeOfDay(undefined)).toBeNull();
    expect(parseTimeOfDay(9.5)).toBeNull();
    expect(parseTimeOfDay({ hour: 9 })).toBeNull();
  });
});

describe('parseDuration', () => {
  it('reads hours with trailing minutes', () => {
    expect(parseDuration('7h45')).toBe(7.75);
    expect(parseDuration('1h15min')).toBe(1.25);
  });

  it('reads whole hours and bare minutes', () => {
    expect(parseDuration('1h')).toBe(1);
    expect(parseDuration('45min')).toBe(0.75);
  });

  it('is case and whitespace tolerant', () => {
    expect(parseDuration(' 1H 30 MIN ')).toBe(1.5);
    expect(parseDuration('90 min')).toBe(1.5);
  });

  it('returns null for empty or unrecognised text', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('   ')).toBeNull();
    expect(parseDuration('about an hour')).toBeNull();
    expect(parseDuration('45')).toBeNull();
    expect(parseDuration('1h15m')).toBeNull();
    expect(parseDuration(null)).toBeNull();
  });
});
