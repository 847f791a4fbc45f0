import { describe, expect, it } from 'vitest';
import { createEmptyRecord, type JournalRecord } from '../journal/record';
import { computeWeekMetrics, renderWeek } from './renderWeek';
import type { Scene } from './types';

const WEEK_LABELS = ['Mon 13/10', 'Tue 14/10', 'Wed 15/10', 'Thu 16/10', 'Fri 17/10', 'Sat 18/10', 'Sun 19/10'];

const wednesdayRecord = (): JournalRecord => {
  const record = createEmptyRecord('2025-10-15');
  record.work = { ...record.work, start: '09:00', lunchBreakStart: '12:30', workedAfternoon: false };
  record.doses[0] = { ...record.doses[0], time: '08:00', doseMg: 20 };
  return record;
};

const dayPrimitives = (scene: Scene) => scene.primitives.filter((primitive) => primitive.dayIndex !== null);

describe('renderWeek', () => {
  it('labels the Monday to Sunday week whatever the pivot day', () => {
    for (let day = 13; day <= 19; day += 1) {
      const scene = renderWeek([], `2025-10-${day}`);
      expect(scene.columns.map((column) => column.label)).toEqual(WEEK_LABELS);
      expect(scene.xTicks.map((tick) => tick.position)).toEqual([0.5, 1.5, 2.5, 3.5, 4.5, 5.5, 6.5]);
    }
  });

  it('accepts a Date pivot and spans a month boundary', () => {
    const scene = renderWeek([], new Date(2025, 9, 1));

    expect(scene.title).toBe('Week of 29/09/2025 to 05/10/2025');
    expect(scene.columns[0].date).toBe('2025-09-29');
    expect(scene.columns[6].date).toBe('2025-10-05');
  });

  it('describes the axes', () => {
    const scene = renderWeek([], '2025-10-15');

    expect(scene.title).toBe('Week of 13/10/2025 to 19/10/2025');
    expect(scene.range).toEqual({ x: [0, 7], y: [6, 24], yInverted: true });
    expect(scene.yTicks.map((tick) => tick.label)).toEqual([
      '06:00', '08:00', '10:00', '12:00', '14:00', '16:00', '18:00', '20:00', '22:00', '24:00',
    ]);
    expect(dayPrimitives(scene)).toEqual([]);
  });

  it('draws one work block and one dose marker for a Wednesday entry', () => {
    const scene = renderWeek([wednesdayRecord()], '2025-10-17');

    const workRects = scene.primitives.filter((primitive) => primitive.kind === 'rect' && primitive.role === 'work');
    expect(workRects).toHaveLength(1);
    expect(workRects[0]).toMatchObject({ dayIndex: 2, y: 9, height: 3.5 });

    const doseTags = scene.primitives.filter((primitive) => primitive.kind === 'tag');
    expect(doseTags).toHaveLength(1);
    expect(doseTags[0]).toMatchObject({ dayIndex: 2, y: 8, text: '20 mg' });

    expect(dayPrimitives(scene).filter((primitive) => primitive.dayIndex !== 2)).toEqual([]);
    expect(scene.columns.map((column) => column.hasRecord)).toEqual([false, false, true, false, false, false, false]);
  });

  it('ignores records outside the week and keeps the first duplicate', () => {
    const outside = wednesdayRecord();
    outside.date = '2025-10-22';
    const duplicate = createEmptyRecord('2025-10-15');
    duplicate.exercise = { done: true, kind: 'running', start: '18:00', duration: '30min' };

    const scene = renderWeek([outside, wednesdayRecord(), duplicate], '2025-10-15');

    expect(scene.primitives.filter((primitive) => primitive.role === 'exercise')).toEqual([]);
    expect(scene.primitives.filter((primitive) => primitive.kind === 'rect' && primitive.role === 'work')).toHaveLength(1);
  });

  it('renders a sparser column for a malformed record instead of failing', () => {
    const malformed: JournalRecord = JSON.parse('{"date":"2025-10-16","work":{"start":42},"doses":"none"}');

    const scene = renderWeek([malformed], '2025-10-16');
    const column = dayPrimitives(scene);

    expect(column.map((primitive) => primitive.role)).toEqual(['summary', 'summary', 'summary']);
    expect(column.every((primitive) => primitive.dayIndex === 3)).toBe(true);
  });

  it('falls back to the default range for an invalid one', () => {
    const scene = renderWeek([], '2025-10-15', { visibleHourRange: [20, 8] });
    expect(scene.range.y).toEqual([6, 24]);
  });

  it('uses a custom visible range for ticks and grid', () => {
    const scene = renderWeek([], '2025-10-15', { visibleHourRange: [8, 20] });

    expect(scene.yTicks[0].label).toBe('08:00');
    expect(scene.yTicks[scene.yTicks.length - 1].label).toBe('20:00');
    expect(scene.primitives.filter((primitive) => primitive.kind === 'line' && primitive.y1 === primitive.y2)).toHaveLength(13);
  });

  it('returns identical scenes for identical input', () => {
    const records = [wednesdayRecord()];
    expect(renderWeek(records, '2025-10-15')).toEqual(renderWeek(records, '2025-10-15'));
  });
});

describe('computeWeekMetrics', () => {
  it('returns metrics keyed by date for the week records only', () => {
    const outside = createEmptyRecord('2025-10-01');
    const metrics = computeWeekMetrics([wednesdayRecord(), outside], '2025-10-15');

    expect(metrics).toEqual({
      '2025-10-15': { sleepHours: null, workHours: 3.5, avgEfficacy: null },
    });
  });
});
