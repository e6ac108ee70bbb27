/**
 * Logging Interceptor
 *
 * Logs query execution details for debugging and monitoring.
 * Supports configurable log levels and slow query detection.
 *
 * @example
 * ```typescript
 * const interceptor = createLoggingInterceptor({
 *   logger: consoleLogger,
 *   logLevel: 'debug',
 *   slowQueryThreshold: 1000, // Log slow queries > 1s
 * });
 * ```
 */

import { QUERY_DEFAULTS } from '../constants';
import { toError } from '../errors';
import { consoleLogger, truncateSql } from '../utils';

import type { QueryContext } from '../query/query-context';
import type { Filters, Scalar } from '../types';
import type { Interceptor, LoggingInterceptorOptions } from './types';

/**
 * Format parameters for logging
 */
function formatParams(params: readonly Scalar[], maxLength = 100): string {
  const str = JSON.stringify(params, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  );
  if (str.length <= maxLength) {
    return str;
  }
  return `${str.slice(0, maxLength)}...`;
}

function describe(context: QueryContext): string {
  const sql = context.operation === 'count' ? (context.countQuery ?? '') : context.selectQuery;
  return `[${context.sourceId}] ${context.operation}: ${truncateSql(sql)}`;
}

/**
 * Create a logging interceptor with the given options
 */
export function createLoggingInterceptor<F extends Filters = Filters>(
  options: LoggingInterceptorOptions = {},
): Interceptor<F> {
  const {
    logger = consoleLogger,
    logLevel = 'debug',
    logParams = false,
    logResults = false,
    slowQueryThreshold = QUERY_DEFAULTS.slowQueryThreshold,
  } = options;

  const log = logger[logLevel].bind(logger);

  return async (context, next) => {
    const label = describe(context);
    const startTime = Date.now();

    if (logParams) {
      const params = context.operation === 'count' ? context.countParams : context.selectParams;
      log(`Executing ${label}`, formatParams(params));
    } else {
      log(`Executing ${label}`);
    }

    try {
      const result = await next(context);
      const duration = Date.now() - startTime;

      if (duration >= slowQueryThreshold) {
        logger.warn(`Slow query detected (${duration}ms): ${label}`, {
          duration,
          rowCount: result.rows.length,
        });
      }

      const message = `Completed ${label} in ${duration}ms (${result.rows.length} rows, total ${result.total ?? 'unknown'})`;
      if (logResults && result.rows.length > 0) {
        log(message, { rows: result.rows.slice(0, 5) });
      } else {
        log(message);
      }

      if (result.cached) {
        log(`Served from cache: ${label}`);
      }

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      logger.error(`Failed ${label} after ${duration}ms: ${toError(error).message}`, { error });
      throw error;
    }
  };
}
