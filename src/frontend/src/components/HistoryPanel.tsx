import React from 'react';
import { EXPORT_FORMATS, formatHistoryEntry } from '@base-converter/shared';
import type { ExportFormat, HistoryEntry } from '../types/api';
import './ConverterPanel.css';
import './HistoryPanel.css';

interface HistoryPanelProps {
  entries: HistoryEntry[];
  exportUrl: (format: ExportFormat) => string;
  onRefresh: () => void;
  onClear: () => void;
}

export const HistoryPanel: React.FC<HistoryPanelProps> = ({ entries, exportUrl, onRefresh, onClear }) => {
  return (
    <div className="panel history-panel">
      <div className="panel-row">
        <b>History</b>
        <button onClick={onRefresh}>refresh</button>
        <button disabled={entries.length === 0} onClick={onClear}>clear</button>
        <span>export:</span>
        {EXPORT_FORMATS.map((f) => (
          <a key={f} href={exportUrl(f)} download>
            {f}
          </a>
        ))}
      </div>

      {entries.length === 0 ? (
        <div className="panel-hint">(empty)</div>
      ) : (
        <ul className="history-list">
          {entries.map((e) => (
            <li key={e.id}>{formatHistoryEntry(e)}</li>
          ))}
        </ul>
      )}
    </div>
  );
};

export default HistoryPanel;
