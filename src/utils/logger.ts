/**
 * Structured logger
 * Writes one JSON line per entry to the console; level comes from LOG_LEVEL.
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SILENT = 'SILENT',
}

export type LogContext = Record<string, unknown>;

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

const parseLevel = (raw: string | undefined): LogLevel => {
  const upper = raw?.toUpperCase();
  return LEVELS.find(level => level === upper) ?? LogLevel.INFO;
};

export class Logger {
  constructor(private readonly logLevel: LogLevel = parseLevel(process.env.LOG_LEVEL)) {}

  info(message: string, data?: LogContext): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogContext): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogContext): void {
    const errorData = error instanceof Error
      ? { name: error.name, message: error.message, stack: error.stack, ...data }
      : { error, ...data };

    this.log(LogLevel.ERROR, message, errorData);
  }

  private log(level: LogLevel, message: string, data?: LogContext): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.logLevel)) {
      return;
    }

    const line = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(data && { data }),
    });

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger();
