/**
 * Logger - Named, levelled console logging
 *
 * Every line is prefixed with `[LEVEL] [name]` and may carry a context object,
 * which is what makes a warning "structured": the message says what happened,
 * the context says where and why.
 *
 * EXAMPLE USAGE:
 * ```typescript
 * const logger = createLogger('CacheClient');
 * logger.warn('Cache read failed, treating as miss', { key, error: 'ECONNREFUSED' });
 * // [WARN] [CacheClient] Cache read failed, treating as miss { key: '...', error: 'ECONNREFUSED' }
 * ```
 */

export enum LogLevel {
  OFF = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

export type LogContext = Record<string, unknown>;

let globalLogLevel: LogLevel = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Parse a LOG_LEVEL value
 *
 * @returns The matching level, or null when the name is not recognised
 */
export function parseLogLevel(level: string): LogLevel | null {
  switch (level.trim().toUpperCase()) {
    case 'OFF': return LogLevel.OFF;
    case 'ERROR': return LogLevel.ERROR;
    case 'WARN': return LogLevel.WARN;
    case 'INFO': return LogLevel.INFO;
    case 'DEBUG': return LogLevel.DEBUG;
    default: return null;
  }
}

export class Logger {
  private readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  private fmt(level: string): string {
    return `[${level}] [${this.name}]`;
  }

  error(message: string, context?: LogContext): void {
    if (globalLogLevel >= LogLevel.ERROR) {
      console.error(this.fmt('ERROR'), message, ...withContext(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (globalLogLevel >= LogLevel.WARN) {
      console.warn(this.fmt('WARN'), message, ...withContext(context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (globalLogLevel >= LogLevel.INFO) {
      console.log(this.fmt('INFO'), message, ...withContext(context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (globalLogLevel >= LogLevel.DEBUG) {
      console.log(this.fmt('DEBUG'), message, ...withContext(context));
    }
  }

  child(name: string): Logger {
    return new Logger(`${this.name}:${name}`);
  }
}

export function createLogger(name: string): Logger {
  return new Logger(name);
}

function withContext(context: LogContext | undefined): LogContext[] {
  return context ? [context] : [];
}
