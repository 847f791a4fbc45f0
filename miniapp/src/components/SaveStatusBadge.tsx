import React from 'react';
import type { StorageTarget } from '../../../src/storage/recordStore';

export type SaveStatus =
  | { state: 'idle' }
  | { state: 'saving' }
  | { state: 'saved'; target: StorageTarget; configured: StorageTarget | null }
  | { state: 'error'; message: string };

interface SaveStatusBadgeProps {
  status: SaveStatus;
}

const TARGET_NAMES: Record<StorageTarget, string> = {
  local: 'local file',
  remote: 'online spreadsheet',
};

const SaveStatusBadge: React.FC<SaveStatusBadgeProps> = ({ status }) => {
  switch (status.state) {
    case 'saving':
      return <div className="save-status save-status--saving">Saving…</div>;
    case 'saved': {
      // Онлайн-таблица была настроена, но запись ушла в файл
      const fellBack = status.configured === 'remote' && status.target === 'local';
      return (
        <div className={`save-status ${fellBack ? 'save-status--warning' : 'save-status--saved'}`}>
          Saved to the {TARGET_NAMES[status.target]}
          {fellBack ? ' (spreadsheet unavailable)' : ''}
        </div>
      );
    }
    case 'error':
      return <div className="save-status save-status--error">Could not save: {status.message}</div>;
    default:
      return null;
  }
};

export default SaveStatusBadge;
