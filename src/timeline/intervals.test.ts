import { describe, expect, it } from 'vitest';
import { createEmptyRecord, type JournalRecord } from '../journal/record';
import { resolveDayIntervals, WORK_AFTERNOON_LABEL, WORK_MORNING_LABEL } from './intervals';

const buildRecord = () => createEmptyRecord('2025-10-15');

describe('resolveDayIntervals', () => {
  it('emits morning and afternoon work blocks', () => {
    const record = buildRecord();
    record.work = {
      ...record.work,
      start: '09:00',
      lunchBreakStart: '12:30',
      workedAfternoon: true,
      afternoonResume: '14:00',
      end: '18:30',
    };

    const { intervals, lastWorkEnd } = resolveDayIntervals(record, 2);

    expect(intervals).toEqual([
      { dayIndex: 2, startHour: 9, endHour: 12.5, category: 'work', label: WORK_MORNING_LABEL, colorKey: 'work' },
      { dayIndex: 2, startHour: 14, endHour: 18.5, category: 'work', label: WORK_AFTERNOON_LABEL, colorKey: 'work' },
    ]);
    expect(lastWorkEnd).toBe(18.5);
  });

  it('skips the afternoon when the flag is off', () => {
    const record = buildRecord();
    record.work = { ...record.work, start: '09:00', lunchBreakStart: '12:00', afternoonResume: '14:00', end: '18:00' };

    const { intervals, lastWorkEnd } = resolveDayIntervals(record, 0);

    expect(intervals).toHaveLength(1);
    expect(lastWorkEnd).toBe(12);
  });

  it('drops zero-length and reversed spans', () => {
    const record = buildRecord();
    record.work = {
      ...record.work,
      start: '12:00',
      lunchBreakStart: '12:00',
      workedAfternoon: true,
      afternoonResume: '18:00',
      end: '14:00',
    };

    const { intervals, lastWorkEnd } = resolveDayIntervals(record, 4);

    expect(intervals).toEqual([]);
    expect(lastWorkEnd).toBeNull();
  });

  it('places exercise using the parsed duration', () => {
    const record = buildRecord();
    record.exercise = { done: true, kind: 'running', start: '19:00', duration: '45min' };

    const { intervals, lastWorkEnd } = resolveDayIntervals(record, 1);

    expect(intervals).toEqual([
      { dayIndex: 1, startHour: 19, endHour: 19.75, category: 'exercise', label: 'Running 45min', colorKey: 'exercise' },
    ]);
    expect(lastWorkEnd).toBeNull();
  });

  it('falls back to a generic name for unknown exercise kinds', () => {
    const record: JournalRecord = JSON.parse(
      '{"date":"2025-10-15","exercise":{"done":true,"kind":"constructor","start":"19:00","duration":"30min"}}',
    );

    const { intervals } = resolveDayIntervals(record, 1);

    expect(intervals.map((interval) => interval.label)).toEqual(['Exercise 30min']);
  });

  it('defaults exercise to one hour when the duration is unusable', () => {
    const record = buildRecord();
    record.exercise = { done: true, kind: null, start: '07:30', duration: 'a while' };

    const [exercise] = resolveDayIntervals(record, 6).intervals;

    expect(exercise.startHour).toBe(7.5);
    expect(exercise.endHour).toBe(8.5);
    expect(exercise.label).toBe('Exercise');
  });

  it('treats a zero duration like a missing one', () => {
    const record = buildRecord();
    record.exercise = { done: true, kind: 'swimming', start: '18:00', duration: '0min' };

    const [exercise] = resolveDayIntervals(record, 3).intervals;

    expect(exercise.endHour).toBe(19);
    expect(exercise.label).toBe('Swimming');
  });

  it('needs both the done flag and a start time for exercise', () => {
    const notDone = buildRecord();
    notDone.exercise = { done: false, kind: 'strength', start: '18:00', duration: '1h' };
    const noStart = buildRecord();
    noStart.exercise = { done: true, kind: 'strength', start: null, duration: '1h' };

    expect(resolveDayIntervals(notDone, 0).intervals).toEqual([]);
    expect(resolveDayIntervals(noStart, 0).intervals).toEqual([]);
  });

  it('never emits an interval ending before it starts', () => {
    const times = ['', '06:00', '09:30', '12:00', '12:00:00', '17:45', 'noon', '23:59'];
    for (const start of times) {
      for (const end of times) {
        const record = buildRecord();
        record.work = {
          ...record.work,
          start,
          lunchBreakStart: end,
          workedAfternoon: true,
          afternoonResume: end,
          end: start,
        };
        record.exercise = { done: true, kind: 'other', start, duration: end };
        for (const interval of resolveDayIntervals(record, 0).intervals) {
          expect(interval.endHour).toBeGreaterThan(interval.startHour);
        }
      }
    }
  });
});
