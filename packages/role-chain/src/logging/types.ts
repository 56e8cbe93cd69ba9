/**
 * Log severity, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields attached to a log event.
 */
export type LogFields = Readonly<Record<string, unknown>>;

/**
 * Logger used for observability events.
 * Logging must never change what an operation returns.
 */
export interface Logger {
  readonly debug: (message: string, fields?: LogFields) => void;
  readonly info: (message: string, fields?: LogFields) => void;
  readonly warn: (message: string, fields?: LogFields) => void;
  readonly error: (message: string, fields?: LogFields) => void;
}

/**
 * Options for creating a console logger.
 */
export interface ConsoleLoggerOptions {
  /** Minimum level to emit (default: ROLE_CHAIN_LOG_LEVEL env var or 'info') */
  readonly level?: LogLevel;
  /** Where formatted lines go (default: console.error) */
  readonly sink?: (line: string) => void;
}
