/**
 * Query Context
 *
 * Per-request value object the interceptor chain operates on. Built fresh for
 * every execution and never shared between requests, so interceptors may
 * mutate it freely: rewrite the query text, swap parameters, attach metadata.
 */

import type { Filters, Scalar } from '../types';

/**
 * What the terminal of a chain runs against the engine.
 */
export type QueryOperation = 'select' | 'count' | 'select+count';

export type ContextualValues = Record<string, unknown>;

export interface QueryContext<F extends Filters = Filters> {
  readonly sourceId: string;
  readonly operation: QueryOperation;
  selectQuery: string;
  selectParams: Scalar[];
  countQuery: string | null;
  countParams: Scalar[];
  filters: F;
  limit: number;
  offset: number;
  /**
   * Values resolved outside the core (e.g. the authenticated user). Treat
   * existing keys as read-only; add derived keys for later interceptors.
   */
  contextualValues: ContextualValues;
  /** Scratch space for interceptors (timings, cache flags) */
  metadata: Record<string, unknown>;
  readonly startTime: number;
  /** Aborted when the request is cancelled or a sibling source failed */
  signal?: AbortSignal;
}

export interface QueryContextInit<F extends Filters> {
  sourceId: string;
  operation: QueryOperation;
  selectQuery: string;
  selectParams: Scalar[];
  countQuery: string | null;
  countParams: Scalar[];
  filters: F;
  limit: number;
  offset: number;
  contextualValues?: ContextualValues;
  signal?: AbortSignal;
}

export function createQueryContext<F extends Filters>(init: QueryContextInit<F>): QueryContext<F> {
  return {
    ...init,
    // copied so one request's derived entries never leak into the caller's object
    contextualValues: { ...init.contextualValues },
    metadata: {},
    startTime: Date.now(),
  };
}

export function getContextualValue(context: QueryContext, key: string): unknown;
export function getContextualValue<T>(
  context: QueryContext,
  key: string,
  guard: (value: unknown) => value is T,
): T | undefined;
export function getContextualValue(
  context: QueryContext,
  key: string,
  guard?: (value: unknown) => boolean,
): unknown {
  const value = context.contextualValues[key];
  if (!guard || value === undefined) {
    return value;
  }
  return guard(value) ? value : undefined;
}
