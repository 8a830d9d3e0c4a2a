export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export * from './errors.js';
