/**
 * @fileoverview Logger utility with configurable output levels
 * @module shared/utils/logger
 *
 * All log output goes to stderr so that stdout carries nothing but model
 * output and can be piped.
 */

import chalk from 'chalk';

// =============================================================================
// LOG LEVELS
// =============================================================================

/**
 * Log level enum.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Config-file names for each level. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Converts a configured level name into a {@link LogLevel}.
 */
export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// =============================================================================
// LOGGER CLASS
// =============================================================================

/**
 * Logger instance for application-wide logging.
 *
 * @example
 * ```typescript
 * logger.setLevel(LogLevel.DEBUG);
 * logger.debug('Resolving credentials', { sources: ['secrets', 'env'] });
 * logger.warn('Model is not in the catalog');
 * ```
 */
export class Logger {
  private level: LogLevel = LogLevel.INFO;
  private readonly prefix: string;
  private readonly parent: Logger | undefined;

  constructor(prefix = 'gemini-quickstart', parent?: Logger) {
    this.prefix = prefix;
    this.parent = parent;
  }

  /**
   * Sets the log level. Child loggers follow their root's level.
   */
  setLevel(level: LogLevel): void {
    if (this.parent !== undefined) {
      this.parent.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent !== undefined ? this.parent.getLevel() : this.level;
  }

  private format(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${this.prefix}] [${level}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.DEBUG) {
      console.warn(chalk.gray(this.format('DEBUG', message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.warn(chalk.blue(this.format('INFO', message)), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.WARN) {
      console.warn(chalk.yellow(this.format('WARN', message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.ERROR) {
      console.error(chalk.red(this.format('ERROR', message)), ...args);
    }
  }

  /**
   * Logs a success message (always at INFO level).
   */
  success(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.warn(chalk.green(this.format('SUCCESS', message)), ...args);
    }
  }

  /**
   * Creates a child logger with a longer prefix that shares this logger's level.
   *
   * @param childPrefix - Additional prefix for the child logger
   */
  child(childPrefix: string): Logger {
    return new Logger(`${this.prefix}:${childPrefix}`, this.parent ?? this);
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

/**
 * Default logger instance.
 */
export const logger = new Logger();
