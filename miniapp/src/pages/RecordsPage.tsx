import React, { useEffect, useState } from 'react';
import type { JournalRecord } from '../../../src/journal/record';
import RecordsTable from '../components/RecordsTable';
import { fetchRecords } from '../utils/api';

const RecordsPage: React.FC = () => {
  const [records, setRecords] = useState<JournalRecord[] | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;

    fetchRecords()
      .then((loaded) => {
        if (!cancelled) {
          setRecords(loaded);
        }
      })
      .catch((fetchError: unknown) => {
        console.error('❌ Failed to load records:', fetchError);
        if (!cancelled) {
          setError(fetchError instanceof Error ? fetchError.message : String(fetchError));
        }
      });

    return () => {
      cancelled = true;
    };
  }, []);

  return (
    <div className="page records-page">
      <header className="page__header">
        <h2>All records</h2>
      </header>

      {error && <div className="page__error">Could not load records: {error}</div>}
      {records && <RecordsTable records={records} />}
    </div>
  );
};

export default RecordsPage;
