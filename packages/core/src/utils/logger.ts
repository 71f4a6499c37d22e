import type { Logger } from '../types';

/* eslint-disable no-console */
export function createConsoleLogger(prefix = '[rowkit]'): Logger {
  return {
    debug: (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args),
    info: (msg, ...args) => console.info(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
