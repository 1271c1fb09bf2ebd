/**
 * Structured Logging
 *
 * Leveled log entries with bound context, written as JSON lines in
 * production and as coloured single lines everywhere else. Level and
 * format come from the configuration layer (`logLevel`, `env`); this module
 * reads no environment variables itself.
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

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
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Logger options for a deployment environment: JSON lines in production,
 * pretty output otherwise
 */
export function loggerOptionsFor(env: string, level: LogLevel): LoggerOptions {
  return { level, format: env === 'production' ? 'json' : 'pretty' };
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  /**
   * Change the minimum level; children created earlier keep theirs
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Whether entries at `level` are written
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Build an entry and hand it to the output
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  /**
   * Warnings and errors go to stderr, everything else to stdout
   */
  private defaultOutput(entry: LogEntry): void {
    const write = entry.level === 'error' || entry.level === 'warn' ? console.error : console.log;
    if (this.format === 'json') {
      write(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry, write);
    }
  }

  private prettyPrint(entry: LogEntry, write: (line: string) => void): void {
    const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
    let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
    }
    write(line);

    if (entry.error?.stack) {
      write(DIM + entry.error.stack + RESET);
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * The process-wide logger. Until `setLogger` installs the configured one,
 * this is an info-level JSON logger.
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}

/**
 * Install the process-wide logger (done once at startup)
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
