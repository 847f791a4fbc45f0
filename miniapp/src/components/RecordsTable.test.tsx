import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import { createEmptyRecord } from '../../../src/journal/record';
import RecordsTable from './RecordsTable';

describe('RecordsTable', () => {
  it('renders one row per record with formatted cells', () => {
    const record = createEmptyRecord('2025-10-15');
    record.sleep.duration = '7h30';
    record.doses[0].doseMg = 20;
    record.doses[2].doseMg = 10;
    record.work = { ...record.work, start: '08:00', lunchBreakStart: '12:00', patientsTotal: 9, patientsNew: 2 };
    record.exercise = { done: true, kind: 'swimming', start: '19:00', duration: '45min' };
    record.dayRating = { difficulty: 6, comment: 'long day' };

    const markup = renderToStaticMarkup(<RecordsTable records={[record, createEmptyRecord('2025-10-16')]} />);

    expect(markup.match(/<tr>/g)?.length).toBe(3);
    expect(markup).toContain('<td>15/10/2025</td><td>7h30</td><td>20 mg / 10 mg</td>');
    expect(markup).toContain('<td>4.0 h</td><td>9 (2 new)</td>');
    expect(markup).toContain('<td>Swimming 45min</td><td>6/10</td><td>long day</td>');
    expect(markup).toContain('<td>16/10/2025</td><td>—</td><td>—</td><td>—</td>');
  });

  it('shows a placeholder when the journal is empty', () => {
    expect(renderToStaticMarkup(<RecordsTable records={[]} />)).toBe('<p class="records-empty">No records yet</p>');
  });
});
