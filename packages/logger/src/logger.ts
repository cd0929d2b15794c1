export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown> | undefined;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(context: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(context: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(context: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(context: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(context: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const levelRank: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Make a context object JSON-safe: errors become plain objects, bigints become
 * strings and repeated object references are replaced by '[Circular]'.
 */
function toJsonSafe(context: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (value instanceof Set) {
      return [...value];
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
    const safe: Record<string, unknown> = JSON.parse(JSON.stringify(context, replacer));
    return safe;
  } catch {
    return { error: '[unserializable]' };
  }
}

let activeConfig: { level: LogLevel; sinks: Sink[] } = {
  level: 'info',
  sinks: [],
};

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    this.emit('trace', contextOrMsg, msg);
  }

  debug(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    this.emit('debug', contextOrMsg, msg);
  }

  info(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    this.emit('info', contextOrMsg, msg);
  }

  warn(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    this.emit('warn', contextOrMsg, msg);
  }

  error(contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    this.emit('error', contextOrMsg, msg);
  }

  private emit(level: LogLevel, contextOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (levelRank[level] < levelRank[activeConfig.level]) return;
    if (activeConfig.sinks.length === 0) return;

    const entry: LogEntry =
      typeof contextOrMsg === 'string' || Object.keys(contextOrMsg).length === 0
        ? {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: typeof contextOrMsg === 'string' ? contextOrMsg : (msg ?? ''),
          }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: msg ?? '',
            context: toJsonSafe(contextOrMsg),
          };

    for (const sink of activeConfig.sinks) {
      sink.write(entry);
    }
  }
}

const loggers = new Map<string, Logger>();

/**
 * Configure level and sinks for the whole process.
 * Loggers obtained before the call pick up the new configuration.
 */
export function initLogger(config: LoggerConfig): void {
  activeConfig = {
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
  for (const sink of activeConfig.sinks) {
    sink.flush();
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
