/**
 * Interceptor Chain
 *
 * Wraps a terminal query execution with an ordered list of interceptors.
 * The first interceptor is outermost: interceptors enter in declared order
 * and exit in reverse. Any of them may rewrite the context, short-circuit
 * without calling `next`, or post-process the result.
 *
 * @example
 * ```typescript
 * const chain = new InterceptorChain()
 *   .use(createGuardInterceptor({ check: isSignedIn, status: 401 }))
 *   .use(createLoggingInterceptor())
 *   .use(createCacheInterceptor({ adapter }));
 *
 * const result = await chain.execute(context, terminal);
 * ```
 */

import type { QueryContext } from '../query/query-context';
import type { Filters } from '../types';
import type { ExecutionResult, Interceptor, NextInterceptor } from './types';

export class InterceptorChain<F extends Filters = Filters> {
  private readonly interceptors: Interceptor<F>[];

  constructor(interceptors: readonly Interceptor<F>[] = []) {
    this.interceptors = [...interceptors];
  }

  /**
   * Add interceptor to the chain
   */
  use(interceptor: Interceptor<F>): this {
    this.interceptors.push(interceptor);
    return this;
  }

  /**
   * Get count of interceptors in chain
   */
  get length(): number {
    return this.interceptors.length;
  }

  /**
   * Compose the chain around `terminal` into a single handler
   */
  build(terminal: NextInterceptor<F>): NextInterceptor<F> {
    // Build the chain from right to left
    let next: NextInterceptor<F> = terminal;

    for (let i = this.interceptors.length - 1; i >= 0; i--) {
      const interceptor = this.interceptors[i];
      if (!interceptor) {
        continue;
      }
      const currentNext = next;
      next = (ctx) => interceptor(ctx, currentNext);
    }

    return next;
  }

  /**
   * Execute the interceptor chain
   */
  async execute(context: QueryContext<F>, terminal: NextInterceptor<F>): Promise<ExecutionResult> {
    return this.build(terminal)(context);
  }
}

/**
 * Compose multiple interceptors into a single interceptor
 */
export function composeInterceptors<F extends Filters = Filters>(
  ...interceptors: Interceptor<F>[]
): Interceptor<F> {
  const chain = new InterceptorChain<F>(interceptors);
  return async (context, next) => chain.execute(context, next);
}
