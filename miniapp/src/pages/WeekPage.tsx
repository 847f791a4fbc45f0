import React, { useEffect, useState } from 'react';
import { addDays, getDateKey, isValidDateKey, parseDateKey } from '../../../src/utils/dateUtils';
import WeekTimeline from '../components/WeekTimeline';
import { fetchWeek, type WeekPayload } from '../utils/api';

const formatHours = (value: number | null) => (value === null ? '—' : `${value.toFixed(1)} h`);

const WeekPage: React.FC = () => {
  const [date, setDate] = useState(() => getDateKey(new Date()));
  const [week, setWeek] = useState<WeekPayload | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    setError(null);

    fetchWeek(date)
      .then((payload) => {
        if (!cancelled) {
          setWeek(payload);
        }
      })
      .catch((fetchError: unknown) => {
        console.error('❌ Failed to load week:', fetchError);
        if (!cancelled) {
          setError(fetchError instanceof Error ? fetchError.message : String(fetchError));
        }
      });

    return () => {
      cancelled = true;
    };
  }, [date]);

  const shiftWeek = (days: number) => {
    const current = parseDateKey(date);
    if (current) {
      setDate(getDateKey(addDays(current, days)));
    }
  };

  return (
    <div className="page week-page">
      <header className="page__header">
        <button type="button" onClick={() => shiftWeek(-7)} aria-label="Previous week">
          ◀
        </button>
        <input
          type="date"
          value={date}
          onChange={(event) => {
            if (isValidDateKey(event.target.value)) {
              setDate(event.target.value);
            }
          }}
        />
        <button type="button" onClick={() => shiftWeek(7)} aria-label="Next week">
          ▶
        </button>
      </header>

      {error && <div className="page__error">Could not load the week: {error}</div>}

      {week && (
        <>
          <WeekTimeline scene={week.scene} />
          <table className="week-metrics">
            <thead>
              <tr>
                <th>Day</th>
                <th>Sleep</th>
                <th>Work</th>
                <th>Efficacy</th>
              </tr>
            </thead>
            <tbody>
              {week.scene.columns
                .filter((column) => column.hasRecord)
                .map((column) => {
                  const metrics = week.metrics[column.date];
                  return (
                    <tr key={column.date}>
                      <td>{column.label}</td>
                      <td>{formatHours(metrics?.sleepHours ?? null)}</td>
                      <td>{formatHours(metrics?.workHours ?? null)}</td>
                      <td>{metrics?.avgEfficacy == null ? '—' : `${metrics.avgEfficacy.toFixed(1)}/10`}</td>
                    </tr>
                  );
                })}
            </tbody>
          </table>
        </>
      )}
    </div>
  );
};

export default WeekPage;
