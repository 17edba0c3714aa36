import { useState, useEffect, useRef } from 'react';
import { ConsoleService, type ConsoleEntry } from '../../core/console/ConsoleService';
import { X, Trash2 } from 'lucide-react';
import './ConsolePanel.css';

interface ConsolePanelProps {
  onClose: () => void;
}

function formatTime(ts: number): string {
  const d = new Date(ts);
  return `${d.getHours().toString().padStart(2, '0')}:${d.getMinutes().toString().padStart(2, '0')}:${d.getSeconds().toString().padStart(2, '0')}`;
}

export function ConsolePanel({ onClose }: ConsolePanelProps) {
  const [entries, setEntries] = useState<ConsoleEntry[]>(() => ConsoleService.getEntries());
  const bodyRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    return ConsoleService.subscribe(setEntries);
  }, []);

  // Auto-scroll to bottom
  useEffect(() => {
    if (bodyRef.current) {
      bodyRef.current.scrollTop = bodyRef.current.scrollHeight;
    }
  }, [entries]);

  return (
    <div className="console-panel">
      <div className="console-panel-header">
        <span>Console</span>
        <div className="console-header-right">
          <button className="console-header-btn" onClick={() => ConsoleService.clear()} title="Clear console">
            <Trash2 size={14} />
          </button>
          <button className="console-header-btn" onClick={onClose} title="Close console">
            <X size={14} />
          </button>
        </div>
      </div>

      <div className="console-body" ref={bodyRef}>
        {entries.length === 0 ? (
          <div className="console-empty">No output yet. Run a check to see one line per limit state.</div>
        ) : (
          entries.map(entry => (
            <div key={entry.id} className={`console-entry console-entry-${entry.type}`}>
              <span className="console-entry-timestamp">{formatTime(entry.timestamp)}</span>
              {entry.content}
            </div>
          ))
        )}
      </div>
    </div>
  );
}
