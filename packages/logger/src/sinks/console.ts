import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export type ConsoleFormat = 'text' | 'json';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  format?: ConsoleFormat | undefined;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Console sink.
 *
 * text: `[HH:MM:SS] LEVEL [category] message {key=value, ...}`
 * json: one JSON object per line, for log collectors.
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly format: ConsoleFormat;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.format = options?.format ?? 'text';
  }

  protected writeEntry(entry: LogEntry): void {
    const line = this.format === 'json' ? this.formatJson(entry) : this.formatText(entry);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      created_at: entry.timestamp.toISOString(),
      severity: entry.level,
      namespace: entry.category,
      event: entry.msg,
      ...(entry.data ? { data: entry.data } : {}),
    });
  }

  private formatText(entry: LogEntry): string {
    const time = entry.timestamp.toISOString().slice(11, 19);
    const data = entry.data ? ` ${this.formatData(entry.data)}` : '';
    return `[${time}] ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${data}`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${levelColors[level]}${upper}\x1b[0m` : upper;
  }

  private formatData(data: Record<string, unknown>): string {
    const pairs = Object.entries(data).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
