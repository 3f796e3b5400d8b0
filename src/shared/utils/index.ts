/**
 * @fileoverview Shared utilities public API
 * @module shared/utils
 */

export { logger, Logger, LogLevel, parseLogLevel, type LogLevelName } from './logger.js';
