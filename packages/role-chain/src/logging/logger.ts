import type { ConsoleLoggerOptions, LogFields, LogLevel, Logger } from './types.js';

/** Environment variable holding the minimum log level */
const LOG_LEVEL_ENV_VAR = 'ROLE_CHAIN_LOG_LEVEL';

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value === 'debug' || value === 'info' || value === 'warn' || value === 'error';

/**
 * Reads the minimum level from the environment.
 */
const levelFromEnv = (): LogLevel => {
  const value = process.env[LOG_LEVEL_ENV_VAR]?.toLowerCase();
  return isLogLevel(value) ? value : 'info';
};

const formatValue = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

/**
 * Formats a log line as "[scope] message key=value ...".
 */
export const formatLogLine = (scope: string, message: string, fields?: LogFields): string => {
  const base = `[${scope}] ${message}`;
  if (fields === undefined) {
    return base;
  }

  const rendered = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  return rendered.length > 0 ? `${base} ${rendered.join(' ')}` : base;
};

/**
 * Creates a logger that writes scoped lines to stderr.
 *
 * Output goes through console.error so stdout stays free for any protocol
 * traffic the host process carries.
 *
 * @param scope - Prefix identifying the emitting component
 * @param options - Level and sink overrides
 * @returns A Logger instance
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('chain-builder');
 * logger.info('first credentials will be loaded from', { base: 'static-key-pair' });
 * // [chain-builder] first credentials will be loaded from base=static-key-pair
 * ```
 */
export const createConsoleLogger = (scope: string, options: ConsoleLoggerOptions = {}): Logger => {
  const { level = levelFromEnv(), sink = (line: string): void => console.error(line) } = options;
  const threshold = levelRank[level];

  const emit =
    (eventLevel: LogLevel) =>
    (message: string, fields?: LogFields): void => {
      if (levelRank[eventLevel] < threshold) {
        return;
      }
      sink(formatLogLine(scope, message, fields));
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
};

/**
 * Creates a logger that drops every event.
 */
export const createSilentLogger = (): Logger => {
  const drop = (): void => undefined;
  return { debug: drop, info: drop, warn: drop, error: drop };
};
