export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ConsoleEntry {
  id: number;
  timestamp: number;
  level: LogLevel;
  /** Subsystem that wrote the entry, e.g. `catalog` or `corrosion` */
  source?: string;
  content: string;
}

type ConsoleListener = (entries: ConsoleEntry[]) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_ENTRIES = 500;
const TRIMMED_ENTRIES = 400;

class ConsoleServiceImpl {
  private entries: ConsoleEntry[] = [];
  private listeners = new Set<ConsoleListener>();
  private nextId = 1;
  private minLevel: LogLevel = 'info';

  getEntries(): ConsoleEntry[] {
    return this.entries;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /** Entries below this level are dropped */
  setMinLevel(level: LogLevel) {
    this.minLevel = level;
  }

  subscribe(listener: ConsoleListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
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

  log(content: string, level: LogLevel = 'info', source?: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    this.addEntry(source === undefined ? { level, content } : { level, source, content });
  }

  debug(content: string, source?: string) {
    this.log(content, 'debug', source);
  }

  info(content: string, source?: string) {
    this.log(content, 'info', source);
  }

  warn(content: string, source?: string) {
    this.log(content, 'warn', source);
  }

  error(content: string, source?: string) {
    this.log(content, 'error', source);
  }

  clear() {
    this.entries = [];
    this.nextId = 1;
    this.notify();
  }
}

export const ConsoleService = new ConsoleServiceImpl();

export type { ConsoleServiceImpl };
