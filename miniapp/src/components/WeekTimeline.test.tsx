import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import { createEmptyRecord } from '../../../src/journal/record';
import { renderWeek } from '../../../src/timeline';
import WeekTimeline from './WeekTimeline';

const box = { width: 800, height: 600, padding: { top: 40, right: 20, bottom: 40, left: 60 } };

describe('WeekTimeline', () => {
  const record = createEmptyRecord('2025-10-15');
  record.doses[0] = { ...record.doses[0], time: '08:00', doseMg: 20 };
  const scene = renderWeek([record], '2025-10-15');

  it('draws one SVG line per line primitive plus dose tags', () => {
    const markup = renderToStaticMarkup(<WeekTimeline scene={scene} box={box} />);
    const lineCount = scene.primitives.filter((primitive) => primitive.kind === 'line').length;

    expect(markup.match(/<line\b/g)?.length).toBe(lineCount);
    expect(markup).toContain('>20 mg</text>');
  });

  it('labels the chart with the week title and day columns', () => {
    const markup = renderToStaticMarkup(<WeekTimeline scene={scene} box={box} />);

    expect(markup).toContain('aria-label="Week of 13/10/2025 to 19/10/2025"');
    expect(markup).toContain('>Wed 15/10</text>');
    expect(markup).toContain('>06:00</text>');
  });
});
