export { createConsoleLogger, createSilentLogger, formatLogLine } from './logger.js';
export type { LogLevel, LogFields, Logger, ConsoleLoggerOptions } from './types.js';
