/**
 * Cache Interceptor
 *
 * Caches raw execution results keyed on the source, the operation and the
 * final query text and parameters (after any rewriting interceptor placed
 * before it). Cache failures are logged and never fail the request.
 *
 * @example
 * ```typescript
 * const interceptor = createCacheInterceptor({
 *   adapter: new MemoryCacheAdapter(),
 *   ttl: 60_000,
 * });
 * ```
 */

import { CACHE_DEFAULTS } from '../constants';
import { toError } from '../errors';
import { generateCacheKey } from '../utils';

import type { QueryContext } from '../query/query-context';
import type { Filters } from '../types';
import type { CacheInterceptorOptions, ExecutionResult, Interceptor } from './types';

/** Rows are copied in and out so callers never share them with the cache */
function copyResult(result: ExecutionResult): ExecutionResult {
  return { rows: result.rows.map((row) => ({ ...row })), total: result.total };
}

export function cacheKeyFor(context: QueryContext, prefix: string = CACHE_DEFAULTS.keyPrefix): string {
  return generateCacheKey(
    [
      context.sourceId,
      context.operation,
      context.operation === 'count' ? null : context.selectQuery,
      context.operation === 'count' ? null : context.selectParams,
      context.operation === 'select' ? null : context.countQuery,
      context.operation === 'select' ? null : context.countParams,
    ],
    prefix,
  );
}

/**
 * Create a cache interceptor with the given options
 */
export function createCacheInterceptor<F extends Filters = Filters>(
  options: CacheInterceptorOptions<F>,
): Interceptor<F> {
  const { adapter, ttl = CACHE_DEFAULTS.ttl, keyPrefix = CACHE_DEFAULTS.keyPrefix, shouldCache, logger } = options;

  return async (context, next) => {
    if (shouldCache && !shouldCache(context)) {
      return next(context);
    }

    const key = cacheKeyFor(context, keyPrefix);
    context.metadata['cacheKey'] = key;

    let cached: ExecutionResult | null = null;
    try {
      cached = await adapter.get(key);
    } catch (error) {
      logger?.warn(`Cache read failed for ${key}: ${toError(error).message}`);
    }

    if (cached) {
      context.metadata['cacheHit'] = true;
      return {
        ...copyResult(cached),
        cached: true,
        duration: Date.now() - context.startTime,
      };
    }

    const result = await next(context);

    try {
      await adapter.set(key, copyResult(result), ttl);
    } catch (error) {
      logger?.warn(`Cache write failed for ${key}: ${toError(error).message}`);
    }

    return { ...result, cached: false };
  };
}
