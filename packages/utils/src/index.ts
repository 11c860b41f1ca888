/**
 * @trialkey/utils - Shared utilities package
 *
 * - Logger utilities
 * - Logging configuration
 * - Error classes
 * - Value description for error messages
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger, consoleFormat, structuredFormat } from './logger.js';
export type { LogContext } from './logger.js';
export { createPackageLogger, getPackageLoggers } from './logging/index.js';
export { getLoggingConfig } from './config/index.js';
export type { LoggingConfig } from './config/index.js';
export * from './errors.js';
export { describeValue } from './describe-value.js';
