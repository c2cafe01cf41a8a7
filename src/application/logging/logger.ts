/**
 * Eligibility - Logger
 *
 * Minimal logging contract used by the application layer, plus the default
 * console implementation and a level filter.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, most verbose first. `silent` disables output.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Wrap a logger so that messages below `level` are dropped.
 *
 * @example
 * ```typescript
 * const logger = createLogger('warn');
 * logger.info('hidden');
 * logger.warn('shown'); // [WARN] shown
 * ```
 */
export function createLogger(level: LogLevel = 'info', sink: ILogger = consoleLogger): ILogger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: Exclude<LogLevel, 'silent'>): boolean =>
    LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) sink.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) sink.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) sink.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) sink.error(message, ...args);
    },
  };
}
