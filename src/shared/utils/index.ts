/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, parseLogLevel } from './logger';
export type { LogMeta, LoggerConfig } from './logger';
export { generateId } from './uuid';
