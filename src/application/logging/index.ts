/**
 * @module application/logging
 */

export { LOG_LEVELS, isLogLevel, consoleLogger, createLogger } from './logger';

export type { ILogger, LogLevel } from './logger';
