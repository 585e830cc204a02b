/**
 * Logging Service
 *
 * Centralized logging with:
 * - Log levels (debug, info, warn, error)
 * - Contextual prefixes
 * - Level taken from LOG_LEVEL, otherwise environment-aware (minimal in prod)
 * - Structured entries for callbacks
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

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

/**
 * Resolve the level from the environment.
 * LOG_LEVEL wins; otherwise production shows warnings and errors only.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = LEVEL_NAMES.get(env.LOG_LEVEL?.trim().toLowerCase() ?? '');
  if (requested !== undefined) {
    return requested;
  }
  return env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private callbacks: LogCallback[];

  constructor(context: string = 'App', level?: LogLevel, callbacks: LogCallback[] = []) {
    this.context = context;
    this.level = level ?? resolveLogLevel();
    this.callbacks = callbacks;
  }

  private formatTimestamp(): string {
    return new Date().toISOString();
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level < this.level) return;

    const entry: LogEntry = {
      level,
      timestamp: this.formatTimestamp(),
      context: this.context,
      message,
      data,
    };

    // Notify callbacks (tests, external sinks)
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

  /**
   * Create a child logger with a sub-context.
   * The child shares the parent's callback list, so callbacks added on
   * the parent also see the child's entries.
   */
  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, this.level, this.callbacks);
  }

  /** Set the minimum log level */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Add a callback for external logging services */
  addCallback(callback: LogCallback): void {
    this.callbacks.push(callback);
  }

  /** Remove a callback */
  removeCallback(callback: LogCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index > -1) {
      this.callbacks.splice(index, 1);
    }
  }
}

// Factory function to create loggers with different contexts
export function createLogger(context: string): Logger {
  return new Logger(context);
}

// Default application logger
export const logger = new Logger('App');

// Pre-configured loggers for common contexts
export const timelineLogger = new Logger('Timeline');
export const serverLogger = new Logger('Server');
export const cliLogger = new Logger('CLI');

export default logger;
