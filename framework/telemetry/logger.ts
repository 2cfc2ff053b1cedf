/**
 * Structured Logging
 *
 * Components take a Logger through their options. Entries go to a sink:
 * stdout by default, an array in tests.
 */

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LEVELS)[number];

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  /** Lowest level emitted (default `info`) */
  level?: LogLevel;
  /** Used by the stdout sink only (default `json`) */
  format?: LogFormat;
  /** Bound into every entry */
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
} as const;

export class Logger {
  private threshold: number;
  private readonly format: LogFormat;
  private readonly bound: Record<string, unknown>;
  private readonly sink: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVELS.indexOf(options.level ?? 'info');
    this.format = options.format ?? 'json';
    this.bound = options.context ?? {};
    this.sink = options.output ?? stdoutSink(this.format);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  /**
   * `error` may be anything that was thrown.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.emit('error', message, context, error);
  }

  /**
   * Same level and sink, with `context` bound on top of this logger's
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: LEVELS[this.threshold],
      format: this.format,
      context: { ...this.bound, ...context },
      output: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.threshold = LEVELS.indexOf(level);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= this.threshold;
  }

  private emit(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.bound, ...context },
    };
    if (error !== undefined) {
      entry.error = describeError(error);
    }

    this.sink(entry);
  }
}

/**
 * One-line coloured rendering; the stack, if any, follows on its own lines
 */
export function formatPretty(entry: LogEntry): string {
  const level = ANSI[entry.level] + entry.level.toUpperCase().padEnd(5) + ANSI.reset;
  let line = `${ANSI.dim}${entry.timestamp}${ANSI.reset} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${ANSI.dim}${JSON.stringify(entry.context)}${ANSI.reset}`;
  }
  if (entry.error) {
    line += ` ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n${ANSI.dim}${entry.error.stack}${ANSI.reset}`;
    }
  }
  return line;
}

function stdoutSink(format: LogFormat): (entry: LogEntry) => void {
  return (entry) => {
    console.log(format === 'json' ? JSON.stringify(entry) : formatPretty(entry));
  };
}

function describeError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide fallback, built from NODE_ENV on first use
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const production = process.env.NODE_ENV === 'production';
    defaultLogger = new Logger({
      level: production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
