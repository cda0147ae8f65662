/**
 * Structured Logging
 *
 * Leveled log entries with merged context, written as JSON lines in
 * production and as colored text during development.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Levels an entry can carry */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  /** Message of the error's cause, when it has one */
  cause?: string;
}

export interface LogEntry {
  level: EntryLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  /** Receives every entry instead of the console */
  output?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

/**
 * Narrow an arbitrary string (config file, env var) to a log level.
 * 'warning' is read as 'warn'.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === undefined) return fallback;
  if (normalized === 'warning') return 'warn';
  return isLogLevel(normalized) ? normalized : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

export class Logger {
  private level: LogLevel;
  private readonly format: 'json' | 'pretty';
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.sink = options.output ?? ((entry) => writeToConsole(entry, this.format));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  /**
   * Anything thrown can be passed as the error
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * A logger writing to the same sink with extra context on every entry
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && SEVERITY[level] >= SEVERITY[this.level];
  }

  private write(level: EntryLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };
    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.sink(entry);
  }
}

export function serializeError(error: unknown): SerializedError {
  const err = error instanceof Error ? error : new Error(String(error));
  const serialized: SerializedError = { name: err.name, message: err.message, stack: err.stack };
  if (err.cause instanceof Error) {
    serialized.cause = err.cause.message;
  } else if (err.cause !== undefined) {
    serialized.cause = String(err.cause);
  }
  return serialized;
}

const COLORS: Record<EntryLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * One human-readable line, plus the stack when an error is attached
 */
export function formatPretty(entry: LogEntry): string {
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
  }
  if (entry.error) {
    line += `\n${DIM}${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}${RESET}`;
    if (entry.error.cause) {
      line += `\n${DIM}caused by: ${entry.error.cause}${RESET}`;
    }
  }
  return line;
}

function writeToConsole(entry: LogEntry, format: 'json' | 'pretty'): void {
  const line = format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
  // warnings and errors go to stderr
  if (entry.level === 'warn' || entry.level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

let defaultLogger: Logger | null = null;

/**
 * The process-wide logger; pretty debug output outside production
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    defaultLogger = new Logger({
      level: parseLogLevel(process.env.LOG_LEVEL, production ? 'info' : 'debug'),
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
