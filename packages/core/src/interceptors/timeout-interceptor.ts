/**
 * Timeout Interceptor
 *
 * Enforces an execution deadline on everything after it in the chain.
 * On expiry the context's abort signal fires, so the engine call is
 * abandoned, and the interceptor throws QueryTimeoutError.
 *
 * @example
 * ```typescript
 * const interceptor = createTimeoutInterceptor({
 *   timeout: 5000,
 *   onTimeout: (context, elapsed) => {
 *     console.warn(`[${context.sourceId}] timed out after ${elapsed}ms`);
 *   },
 * });
 * ```
 */

import { QUERY_DEFAULTS } from '../constants';
import { QueryTimeoutError } from '../errors';

import type { Filters } from '../types';
import type { Interceptor, TimeoutInterceptorOptions } from './types';

/**
 * Create a timeout interceptor with the given options
 */
export function createTimeoutInterceptor<F extends Filters = Filters>(
  options: TimeoutInterceptorOptions<F> = {},
): Interceptor<F> {
  const { timeout = QUERY_DEFAULTS.queryTimeout, onTimeout } = options;

  return async (context, next) => {
    // If timeout is 0 or negative, skip timeout handling
    if (timeout <= 0) {
      return next(context);
    }

    const parentSignal = context.signal;
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (parentSignal?.aborted) {
      controller.abort();
    } else {
      parentSignal?.addEventListener('abort', forwardAbort, { once: true });
    }
    context.signal = controller.signal;

    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const elapsed = Date.now() - context.startTime;

        context.metadata['timedOut'] = true;
        context.metadata['timeoutMs'] = timeout;
        context.metadata['elapsedMs'] = elapsed;

        // reject before aborting so the timeout wins the race
        reject(new QueryTimeoutError(`Query timed out after ${elapsed}ms (limit: ${timeout}ms)`, timeout));
        controller.abort();

        if (onTimeout) {
          try {
            onTimeout(context, elapsed);
          } catch (callbackError) {
            context.metadata['onTimeoutError'] = callbackError;
          }
        }
      }, timeout);
    });

    try {
      const result = await Promise.race([next(context), timeoutPromise]);
      return { ...result, duration: Date.now() - context.startTime };
    } finally {
      clearTimeout(timeoutId);
      parentSignal?.removeEventListener('abort', forwardAbort);
      context.signal = parentSignal;
    }
  };
}
