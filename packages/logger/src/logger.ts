export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields attached to a log event (request URL, dataset name, row counts...).
 */
export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  data?: LogData | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(data: LogData, msg: string): void;
  debug(msg: string): void;
  debug(data: LogData, msg: string): void;
  info(msg: string): void;
  info(data: LogData, msg: string): void;
  warn(msg: string): void;
  warn(data: LogData, msg: string): void;
  error(msg: string): void;
  error(data: LogData, msg: string): void;
  log(level: LogLevel, msg: string, data?: LogData): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function hasLogData(value: Error): value is Error & { logData: LogData } {
  const candidate: unknown = Reflect.get(value, 'logData');
  return typeof candidate === 'object' && candidate !== null && !Array.isArray(candidate);
}

/**
 * Serialize structured log data so every sink receives plain JSON values.
 *
 * Errors keep name, message and stack; client errors that carry their own
 * `logData` (see ApiError in @ons-clients/http) have it nested under `data`,
 * and a `cause` chain is followed. BigInt becomes a string. Repeated object
 * references are replaced with '[Circular]'.
 */
export function serializeLogData(data: LogData): LogData {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      const serialized: Record<string, unknown> = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
      if (hasLogData(value)) {
        serialized['data'] = value.logData;
      }
      if (value.cause !== undefined) {
        serialized['cause'] = value.cause;
      }
      return serialized;
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(data, replacer));
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return { value: parsed };
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(dataOrMsg: LogData | string, maybeMsg?: string): void {
    this.emit('trace', dataOrMsg, maybeMsg);
  }

  debug(dataOrMsg: LogData | string, maybeMsg?: string): void {
    this.emit('debug', dataOrMsg, maybeMsg);
  }

  info(dataOrMsg: LogData | string, maybeMsg?: string): void {
    this.emit('info', dataOrMsg, maybeMsg);
  }

  warn(dataOrMsg: LogData | string, maybeMsg?: string): void {
    this.emit('warn', dataOrMsg, maybeMsg);
  }

  error(dataOrMsg: LogData | string, maybeMsg?: string): void {
    this.emit('error', dataOrMsg, maybeMsg);
  }

  log(level: LogLevel, msg: string, data?: LogData): void {
    if (data) {
      this.emit(level, data, msg);
    } else {
      this.emit(level, msg);
    }
  }

  private emit(level: LogLevel, dataOrMsg: LogData | string, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[state.level]) return;
    if (state.sinks.length === 0) return;

    const entry: LogEntry =
      typeof dataOrMsg === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: dataOrMsg }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            data: serializeLogData(dataOrMsg),
          };

    for (const sink of state.sinks) {
      sink.write(entry);
    }
  }
}

// Loggers read this on every call, so ones created at module load pick up a later initLogger.
let state: { level: LogLevel; sinks: Sink[] } = {
  level: 'info',
  sinks: [],
};

const loggers = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  state = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
  loggers.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggers.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggers.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of state.sinks) {
    sink.flush();
  }
}
