import { LogEntry } from './log-entry.js';
import { Listener, Notifier } from './notifier.js';

export type LogList = ReadonlyArray<LogEntry>;

export interface LogStoreOptions {
  /** Keep only the newest entries once this many are stored. Unbounded when omitted. */
  maxEntries?: number;
}

const EMPTY: LogList = Object.freeze([]);

export class LogStore {
  private readonly notifier = new Notifier<LogList>(EMPTY);
  private readonly maxEntries?: number;

  constructor(options: LogStoreOptions = {}) {
    if (options.maxEntries !== undefined) {
      if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
        throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
      }
      this.maxEntries = options.maxEntries;
    }
  }

  /** Puts `entry` at the head of the list and publishes the new list. */
  addLog(entry: LogEntry) {
    const next = [entry, ...this.notifier.value];
    if (this.maxEntries !== undefined && next.length > this.maxEntries) {
      next.length = this.maxEntries;
    }
    this.notifier.set(Object.freeze(next));
  }

  clearLogs() {
    this.notifier.set(Object.freeze<LogEntry[]>([]));
  }

  subscribe(listener: Listener<LogList>): () => void {
    return this.notifier.subscribe(listener);
  }

  currentLogs(): LogList {
    return this.notifier.value;
  }

  get logsNotifier(): Notifier<LogList> {
    return this.notifier;
  }
}

export const logStore = new LogStore();
