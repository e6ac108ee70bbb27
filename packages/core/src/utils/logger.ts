import type { Logger } from '../types';

/* eslint-disable no-console */
export const consoleLogger: Logger = {
  debug: (msg, ...args) => console.debug(`[rowmux] ${msg}`, ...args),
  info: (msg, ...args) => console.info(`[rowmux] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[rowmux] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[rowmux] ${msg}`, ...args),
};
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength = 200): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
