export interface ConsoleEntry {
  id: number;
  timestamp: number;
  type: 'system' | 'check' | 'warning' | 'error';
  source?: string;
  content: string;
}

type ConsoleListener = (entries: ConsoleEntry[]) => void;

const MAX_ENTRIES = 500;
const TRIMMED_ENTRIES = 400;

class ConsoleServiceImpl {
  private entries: ConsoleEntry[] = [];
  private listeners = new Set<ConsoleListener>();
  private nextId = 1;

  getEntries(): ConsoleEntry[] {
    return this.entries;
  }

  subscribe(listener: ConsoleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify() {
    const snapshot = [...this.entries];
    this.listeners.forEach(fn => fn(snapshot));
  }

  private addEntry(entry: Omit<ConsoleEntry, 'id' | 'timestamp'>) {
    this.entries.push({
      ...entry,
      id: this.nextId++,
      timestamp: Date.now(),
    });
    // Cap at 500 entries
    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-TRIMMED_ENTRIES);
    }
    this.notify();
  }

  log(content: string, type: ConsoleEntry['type'] = 'system', source?: string) {
    this.addEntry({ type, content, source });
  }

  /** One line per evaluated limit state, e.g. "W8X10 compression E3-1: 0.532 OK" */
  logCheck(source: string, check: string, ratio: number, status: string, equation?: string) {
    const ref = equation ? ` ${equation}` : '';
    this.addEntry({
      type: status === 'FAIL' ? 'warning' : 'check',
      source,
      content: `${source} ${check}${ref}: ${ratio.toFixed(3)} ${status}`,
    });
  }

  logError(err: unknown, source?: string) {
    const content = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    this.addEntry({ type: 'error', source, content });
  }

  clear() {
    this.entries = [];
    this.nextId = 1;
    this.notify();
  }
}

export const ConsoleService = new ConsoleServiceImpl();
