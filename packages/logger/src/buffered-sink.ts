import { LOG_LEVELS, type LogEntry, type LogLevel, type Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries kept while waiting for the next tick; the oldest go first */
  maxBuffer?: number | undefined;
  /** Sink-level threshold on top of the logger's own level */
  level?: LogLevel | undefined;
}

/**
 * Queues entries and writes them on the next tick, so a tight row loop
 * (CSV streaming, paging through datasets) never waits on console I/O.
 * Subclasses implement `writeEntry`.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private overflow = 0;
  private drainScheduled = false;
  private readonly capacity: number;
  private readonly minLevel: number;

  constructor(options?: BufferedSinkOptions) {
    this.capacity = Math.max(1, options?.maxBuffer ?? 1000);
    this.minLevel = LOG_LEVELS.indexOf(options?.level ?? 'trace');
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (LOG_LEVELS.indexOf(entry.level) < this.minLevel) return;

    this.queue.push(entry);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.overflow++;
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Write everything queued so far. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.queue;
    const overflow = this.overflow;
    this.queue = [];
    this.overflow = 0;
    this.drainScheduled = false;

    if (overflow > 0) {
      this.writeEntry({
        category: 'logger',
        data: { dropped: overflow },
        level: 'warn',
        msg: 'log buffer overflowed, oldest entries dropped',
        timestamp: new Date(),
      });
    }
    entries.forEach((entry) => this.writeEntry(entry));
  }
}
