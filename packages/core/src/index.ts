export * from './types.js';
export * from './interview.js';
export * from './field-validation.js';
export * from './notification-templates.js';
export { createLogger, errorMessage, parseLogLevel, type Logger, type LogLevel } from './logger.js';
