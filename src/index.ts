/**
 * wiredriver: launch JSON Wire Protocol drivers and talk to them.
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './driver/index.js';
export * from './errors/index.js';
export * from './protocol/index.js';
export * from './schema/index.js';
export { createLogger, silentLogger, parseLogLevel, logLevelSchema } from './utils/logger.js';
export type { Logger, LogLevel, LogFields, LoggerOptions } from './utils/logger.js';
