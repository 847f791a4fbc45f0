import React from 'react';
import { EXERCISE_NAMES, type DoseMg, type JournalRecord } from '../../../src/journal/record';
import { workHours } from '../../../src/timeline/metrics';
import { formatFullDate, parseDateKey } from '../../../src/utils/dateUtils';

interface RecordsTableProps {
  records: JournalRecord[];
}

const EMPTY = '—';

const formatDate = (key: string) => {
  const date = parseDateKey(key);
  return date ? formatFullDate(date) : key;
};

const formatDoses = (record: JournalRecord) => {
  const doses = record.doses
    .map((dose) => dose.doseMg)
    .filter((doseMg): doseMg is DoseMg => doseMg !== null);
  return doses.length > 0 ? doses.map((doseMg) => `${doseMg} mg`).join(' / ') : EMPTY;
};

const formatExercise = (record: JournalRecord) => {
  const { exercise } = record;
  if (!exercise.done) {
    return EMPTY;
  }
  const name = exercise.kind ? EXERCISE_NAMES[exercise.kind] : 'Exercise';
  return exercise.duration ? `${name} ${exercise.duration}` : name;
};

/**
 * Все записи журнала по одной строке на день
 */
const RecordsTable: React.FC<RecordsTableProps> = ({ records }) => {
  if (records.length === 0) {
    return <p className="records-empty">No records yet</p>;
  }

  return (
    <table className="week-metrics records-table">
      <thead>
        <tr>
          <th>Date</th>
          <th>Sleep</th>
          <th>Doses</th>
          <th>Work</th>
          <th>Patients</th>
          <th>Exercise</th>
          <th>Difficulty</th>
          <th>Comment</th>
        </tr>
      </thead>
      <tbody>
        {records.map((record) => {
          const hours = workHours(record);
          return (
            <tr key={record.date}>
              <td>{formatDate(record.date)}</td>
              <td>{record.sleep.duration ?? EMPTY}</td>
              <td>{formatDoses(record)}</td>
              <td>{hours === null ? EMPTY : `${hours.toFixed(1)} h`}</td>
              <td>{`${record.work.patientsTotal} (${record.work.patientsNew} new)`}</td>
              <td>{formatExercise(record)}</td>
              <td>{record.dayRating.difficulty === null ? EMPTY : `${record.dayRating.difficulty}/10`}</td>
              <td>{record.dayRating.comment || EMPTY}</td>
            </tr>
          );
        })}
      </tbody>
    </table>
  );
};

export default RecordsTable;
