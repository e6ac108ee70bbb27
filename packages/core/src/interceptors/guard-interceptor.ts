import { InterceptorRejectedError } from '../errors';

import type { Filters } from '../types';
import type { GuardInterceptorOptions, Interceptor } from './types';

/**
 * Short-circuits the chain with InterceptorRejectedError when `check` fails.
 * Nothing after the guard, the engine included, runs.
 */
export function createGuardInterceptor<F extends Filters = Filters>(
  options: GuardInterceptorOptions<F>,
): Interceptor<F> {
  const { check, status = 403, reason = 'Access forbidden' } = options;

  return async (context, next) => {
    if (!(await check(context))) {
      throw new InterceptorRejectedError(status, reason);
    }
    return next(context);
  };
}

/**
 * Rejects requests that arrive without the named contextual value, e.g. an
 * authenticated user resolved by the transport layer.
 */
export function requireContextualValue<F extends Filters = Filters>(
  key: string,
  options: { status?: number; reason?: string } = {},
): Interceptor<F> {
  return createGuardInterceptor<F>({
    check: (context) => context.contextualValues[key] != null,
    status: options.status ?? 401,
    reason: options.reason ?? 'Authentication required',
  });
}
