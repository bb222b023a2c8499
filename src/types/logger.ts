/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface accepted by the monitor and history sessions
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const session = new MonitorSession({ logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const session = new MonitorSession({ logger: consoleLogger });
 * ```
 */
export interface Logger {
  /** Detailed diagnostic information, e.g. every handled event */
  debug(msgOrObj: string | object, ...args: unknown[]): void;
  info(msgOrObj: string | object, ...args: unknown[]): void;
  /** Recoverable problems such as a failed poll */
  warn(msgOrObj: string | object, ...args: unknown[]): void;
  error(msgOrObj: string | object, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj, ...args) => console.debug(msgOrObj, ...args),
  info: (msgOrObj, ...args) => console.info(msgOrObj, ...args),
  warn: (msgOrObj, ...args) => console.warn(msgOrObj, ...args),
  error: (msgOrObj, ...args) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output. Default for sessions and tests.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const min = LOG_LEVELS[minLevel];
  const enabled = (level: Exclude<LogLevel, 'none'>) => LOG_LEVELS[level] >= min;

  return {
    debug: (msgOrObj, ...args) => {
      if (enabled('debug')) baseLogger.debug(msgOrObj, ...args);
    },
    info: (msgOrObj, ...args) => {
      if (enabled('info')) baseLogger.info(msgOrObj, ...args);
    },
    warn: (msgOrObj, ...args) => {
      if (enabled('warn')) baseLogger.warn(msgOrObj, ...args);
    },
    error: (msgOrObj, ...args) => {
      if (enabled('error')) baseLogger.error(msgOrObj, ...args);
    },
  };
}
