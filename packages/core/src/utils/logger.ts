/**
 * Console logger with a tag and a level threshold
 * @internal
 */

import type { Logger, LogLevel } from '../types/public-api.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Create a logger that prefixes every line with `[tag]`.
 *
 * @example
 * ```typescript
 * const log = createLogger('kitchen', 'debug');
 * log.info('Listening on port', 3000); // [kitchen] Listening on port 3000
 * ```
 */
export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${tag}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}

/**
 * Logger that drops everything (tests)
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
