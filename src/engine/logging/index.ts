/**
 * Logging module exports
 *
 * @module engine/logging
 */

export { createConsoleLogger, silentLogger } from './logger.js';
export type { ConsoleLoggerOptions, Logger, LogLevel } from './logger.js';
