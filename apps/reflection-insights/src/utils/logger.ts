/**
 * Reflection Insights Structured Logger
 *
 * Level-filtered console logging with JSON or pretty output.
 */

import { CONFIG } from './config';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

interface LogError {
  message: string;
  stack?: string;
  code?: string;
}

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: string;
  data?: unknown;
  error?: LogError;
}

/**
 * Resolve a configured level name, defaulting to INFO
 */
export const parseLogLevel = (name: string): LogLevel => {
  return LOG_LEVEL_MAP[name.toLowerCase()] ?? LogLevel.INFO;
};

/**
 * Logger class
 */
export class Logger {
  private readonly currentLevel: LogLevel;
  private readonly pretty: boolean;
  private readonly context?: string;

  constructor(context?: string, level?: LogLevel, pretty?: boolean) {
    this.currentLevel = level ?? parseLogLevel(CONFIG.logging.level);
    this.pretty = pretty ?? CONFIG.logging.pretty;
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    return new Logger(childContext, this.currentLevel, this.pretty);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.currentLevel;
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

  error(message: string, error?: unknown, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data, toLogError(error));
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: LogError): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.context,
      data,
      error,
    };

    const output = this.pretty ? this.formatPretty(entry) : JSON.stringify(entry);
    this.getLogFunction(level)(output);
  }

  /**
   * Format log entry as pretty text
   */
  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [`[${entry.timestamp}]`, `[${entry.level}]`];

    if (entry.context) {
      parts.push(`[${entry.context}]`);
    }

    parts.push(entry.message);

    if (entry.data !== undefined) {
      parts.push('\n  Data:', JSON.stringify(entry.data, null, 2));
    }

    if (entry.error) {
      parts.push('\n  Error:', entry.error.message);
      if (entry.error.code) {
        parts.push(`(${entry.error.code})`);
      }
      if (entry.error.stack) {
        parts.push('\n', entry.error.stack);
      }
    }

    return parts.join(' ');
  }

  private getLogFunction(level: LogLevel): (message: string) => void {
    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
        return console.error;
      default:
        return console.log;
    }
  }
}

function toLogError(error: unknown): LogError | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { message: error.message, stack: error.stack, code };
  }
  return { message: String(error) };
}

/**
 * Create logger for specific module
 */
export const createLogger = (context: string): Logger => {
  return new Logger(context);
};
