/**
 * Interceptor Types
 *
 * Type definitions for the interceptor pattern.
 */

import type { CacheAdapter } from '../interfaces';
import type { QueryContext } from '../query/query-context';
import type { Filters, Logger, Row } from '../types';

/**
 * Raw outcome of one source execution, before row mapping.
 */
export interface ExecutionResult {
  rows: Row[];
  /** `null` when no count query ran */
  total: number | null;
  cached?: boolean;
  duration?: number;
}

/**
 * The remainder of the chain, terminal included
 */
export type NextInterceptor<F extends Filters = Filters> = (
  context: QueryContext<F>,
) => Promise<ExecutionResult>;

/**
 * Interceptor function signature
 */
export type Interceptor<F extends Filters = Filters> = (
  context: QueryContext<F>,
  next: NextInterceptor<F>,
) => Promise<ExecutionResult>;

/**
 * Cache interceptor specific options
 */
export interface CacheInterceptorOptions<F extends Filters = Filters> {
  adapter: CacheAdapter<ExecutionResult>;
  ttl?: number;
  keyPrefix?: string;
  shouldCache?: (context: QueryContext<F>) => boolean;
  logger?: Logger;
}

/**
 * Timeout interceptor specific options
 */
export interface TimeoutInterceptorOptions<F extends Filters = Filters> {
  timeout?: number;
  onTimeout?: (context: QueryContext<F>, elapsed: number) => void;
}

/**
 * Logging interceptor specific options
 */
export interface LoggingInterceptorOptions {
  logger?: Logger;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  logParams?: boolean;
  logResults?: boolean;
  slowQueryThreshold?: number;
}

/**
 * Guard interceptor specific options
 */
export interface GuardInterceptorOptions<F extends Filters = Filters> {
  check: (context: QueryContext<F>) => boolean | Promise<boolean>;
  status?: number;
  reason?: string;
}

/**
 * Template interceptor specific options. Each placeholder name (without the
 * surrounding underscores) maps to a function producing an identifier.
 */
export interface TemplateInterceptorOptions<F extends Filters = Filters> {
  placeholders: Record<string, (context: QueryContext<F>) => unknown>;
}
