import React, { useEffect, useState } from 'react';
import { createEmptyRecord, type JournalRecord } from '../../../src/journal/record';
import type { StorageTarget } from '../../../src/storage/recordStore';
import { getDateKey, isValidDateKey } from '../../../src/utils/dateUtils';
import JournalForm from '../components/JournalForm';
import SaveStatusBadge, { type SaveStatus } from '../components/SaveStatusBadge';
import { fetchRecord, fetchStorageTarget, saveRecord } from '../utils/api';

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const JournalPage: React.FC = () => {
  const [date, setDate] = useState(() => getDateKey(new Date()));
  const [record, setRecord] = useState<JournalRecord>(() => createEmptyRecord(getDateKey(new Date())));
  const [isLoading, setIsLoading] = useState(true);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [configuredTarget, setConfiguredTarget] = useState<StorageTarget | null>(null);
  const [saveStatus, setSaveStatus] = useState<SaveStatus>({ state: 'idle' });

  useEffect(() => {
    fetchStorageTarget()
      .then(setConfiguredTarget)
      .catch((error: unknown) => {
        console.error('❌ Failed to read storage target:', error);
      });
  }, []);

  useEffect(() => {
    let cancelled = false;
    setIsLoading(true);
    setLoadError(null);
    setSaveStatus({ state: 'idle' });

    fetchRecord(date)
      .then((loaded) => {
        if (!cancelled) {
          setRecord(loaded ?? createEmptyRecord(date));
        }
      })
      .catch((error: unknown) => {
        console.error('❌ Failed to load record:', error);
        if (!cancelled) {
          setRecord(createEmptyRecord(date));
          setLoadError(errorMessage(error));
        }
      })
      .finally(() => {
        if (!cancelled) {
          setIsLoading(false);
        }
      });

    return () => {
      cancelled = true;
    };
  }, [date]);

  const handleSave = async () => {
    setSaveStatus({ state: 'saving' });
    try {
      const result = await saveRecord(record);
      setRecord(result.record);
      setSaveStatus({ state: 'saved', target: result.target, configured: configuredTarget });
    } catch (error) {
      console.error('❌ Failed to save record:', error);
      setSaveStatus({ state: 'error', message: errorMessage(error) });
    }
  };

  return (
    <div className="page journal-page">
      <header className="page__header">
        <h2>Daily journal</h2>
        <input
          type="date"
          value={date}
          onChange={(event) => {
            if (isValidDateKey(event.target.value)) {
              setDate(event.target.value);
            }
          }}
        />
      </header>

      {loadError && <div className="page__error">Could not load the record: {loadError}</div>}

      <JournalForm record={record} disabled={isLoading || saveStatus.state === 'saving'} onChange={setRecord} />

      <footer className="page__footer">
        <button
          type="button"
          className="primary-button"
          disabled={isLoading || saveStatus.state === 'saving'}
          onClick={() => void handleSave()}
        >
          Save
        </button>
        <SaveStatusBadge status={saveStatus} />
      </footer>
    </div>
  );
};

export default JournalPage;
