import React, { useEffect, useState } from 'react';
import {
  isSeriesKey,
  SERIES_KEYS,
  SERIES_NAMES,
  type CorrelationResult,
  type SeriesKey,
} from '../../../src/stats/correlation';
import ScatterPlot from '../components/ScatterPlot';
import { fetchCorrelation } from '../utils/api';

const SELECTION_STORAGE_KEY = 'stats_series_selection';

const DEFAULT_SELECTION: { x: SeriesKey; y: SeriesKey } = { x: 'sleepHours', y: 'difficulty' };

const loadStoredSelection = (): { x: SeriesKey; y: SeriesKey } => {
  if (typeof window === 'undefined') {
    return DEFAULT_SELECTION;
  }
  const raw = window.localStorage.getItem(SELECTION_STORAGE_KEY);
  if (!raw) {
    return DEFAULT_SELECTION;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && 'x' in parsed && 'y' in parsed) {
      return {
        x: isSeriesKey(parsed.x) ? parsed.x : DEFAULT_SELECTION.x,
        y: isSeriesKey(parsed.y) ? parsed.y : DEFAULT_SELECTION.y,
      };
    }
  } catch (error) {
    console.warn('Failed to parse stored series selection:', error);
  }
  return DEFAULT_SELECTION;
};

interface SeriesSelectProps {
  label: string;
  value: SeriesKey;
  onChange: (value: SeriesKey) => void;
}

const SeriesSelect: React.FC<SeriesSelectProps> = ({ label, value, onChange }) => (
  <label>
    {label}
    <select
      value={value}
      onChange={(event) => {
        if (isSeriesKey(event.target.value)) {
          onChange(event.target.value);
        }
      }}
    >
      {SERIES_KEYS.map((key) => (
        <option key={key} value={key}>
          {SERIES_NAMES[key]}
        </option>
      ))}
    </select>
  </label>
);

const StatsPage: React.FC = () => {
  const [selection, setSelection] = useState(loadStoredSelection);
  const [result, setResult] = useState<CorrelationResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    window.localStorage.setItem(SELECTION_STORAGE_KEY, JSON.stringify(selection));

    let cancelled = false;
    setError(null);

    fetchCorrelation(selection.x, selection.y)
      .then((payload) => {
        if (!cancelled) {
          setResult(payload);
        }
      })
      .catch((fetchError: unknown) => {
        console.error('❌ Failed to load correlation:', fetchError);
        if (!cancelled) {
          setError(fetchError instanceof Error ? fetchError.message : String(fetchError));
        }
      });

    return () => {
      cancelled = true;
    };
  }, [selection]);

  return (
    <div className="page stats-page">
      <header className="page__header">
        <SeriesSelect label="X" value={selection.x} onChange={(x) => setSelection({ ...selection, x })} />
        <SeriesSelect label="Y" value={selection.y} onChange={(y) => setSelection({ ...selection, y })} />
      </header>

      {error && <div className="page__error">Could not load statistics: {error}</div>}

      {result && (
        <>
          <ScatterPlot result={result} xLabel={SERIES_NAMES[result.x]} yLabel={SERIES_NAMES[result.y]} />
          <p className="stats-page__summary">
            {result.count} days · r = {result.pearson === null ? 'n/d' : result.pearson.toFixed(2)}
            {result.fit && ` · y = ${result.fit.slope.toFixed(2)}x + ${result.fit.intercept.toFixed(2)}`}
          </p>
        </>
      )}
    </div>
  );
};

export default StatsPage;
