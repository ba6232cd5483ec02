/**
 * Logging Service
 *
 * Centralized logging with:
 * - Log levels (debug, info, warn, error)
 * - Contextual prefixes, nested through child()
 * - Level taken from LOG_LEVEL, else NODE_ENV (verbose outside production)
 * - Callbacks so a host can forward entries elsewhere
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  context: string;
  message: string;
  data?: unknown;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export class Logger {
  private level: LogLevel;
  private context: string;
  private callbacks: LogCallback[];

  constructor(context: string = 'App', level?: LogLevel, callbacks: LogCallback[] = []) {
    this.context = context;
    this.level = level ?? this.getDefaultLevel();
    this.callbacks = callbacks;
  }

  private getDefaultLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.toLowerCase();
    if (configured && configured in LEVEL_NAMES) {
      return LEVEL_NAMES[configured] ?? LogLevel.INFO;
    }
    return process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      context: this.context,
      message,
      data,
    };

    this.callbacks.forEach(cb => cb(entry));

    const prefix = `[${this.context}]`;
    const args = data !== undefined ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      case LogLevel.INFO:
        console.info(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.ERROR:
        console.error(...args);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /** Create a child logger with a sub-context; callbacks are shared with the parent */
  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, this.level, this.callbacks);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  addCallback(callback: LogCallback): void {
    this.callbacks.push(callback);
  }

  removeCallback(callback: LogCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index > -1) {
      this.callbacks.splice(index, 1);
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}

export const logger = new Logger('App');

export const storyboardLogger = new Logger('Storyboard');
export const collaboratorLogger = new Logger('Collaborator');
export const auditLogger = new Logger('Audit');

export default logger;
