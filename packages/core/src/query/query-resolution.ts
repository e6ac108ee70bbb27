import { InvalidFiltersError, InvalidQueryError, RowmuxError, toError } from '../errors';

import type { Filters, Scalar } from '../types';
import type { FilterFields, ParamSpec, QueryText, SourceDefinition } from './source';

function toScalar(value: unknown, field: string): Scalar {
  if (value === undefined || value === null) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw new InvalidFiltersError(`Filter field "${field}" cannot be bound as a query parameter`, [
    `${field}: expected a scalar value`,
  ]);
}

function fieldValues<F extends Filters>(filters: F, fields: FilterFields<F>): Scalar[] {
  return fields.map((field) => toScalar(filters[field], field));
}

function build<R>(label: string, fn: () => R): R {
  try {
    return fn();
  } catch (error) {
    if (error instanceof RowmuxError) {
      throw error;
    }
    throw new InvalidQueryError(`Failed to build ${label}: ${toError(error).message}`, toError(error));
  }
}

/**
 * Resolve fixed or filter-dependent query text. Empty text is rejected
 * rather than sent to the engine.
 */
export function resolveQueryText<F extends Filters>(text: QueryText<F>, filters: F, label: string): string {
  let resolved: unknown = text;
  if (typeof text === 'function') {
    const builder = text;
    resolved = build(label, () => builder(filters));
  }
  if (typeof resolved !== 'string' || resolved.trim() === '') {
    throw new InvalidQueryError(`The ${label} resolved to empty text`);
  }
  return resolved;
}

function resolveBaseParams<F extends Filters>(spec: ParamSpec<F> | undefined, filters: F, label: string): Scalar[] {
  if (spec === undefined) {
    return [];
  }
  if (typeof spec === 'function') {
    const builder = spec;
    return build(label, () => builder(filters));
  }
  return fieldValues(filters, spec);
}

export function resolveSelectParams<F extends Filters>(
  source: SourceDefinition<F>,
  filters: F,
  limit: number,
  offset: number,
): Scalar[] {
  const spec = source.selectParams;
  if (typeof spec === 'function') {
    const builder = spec;
    return build('select parameters', () => builder(filters, limit, offset));
  }
  const leading = spec ? fieldValues(filters, spec) : resolveBaseParams(source.params, filters, 'parameters');
  return [...leading, limit, offset];
}

export function resolveCountParams<F extends Filters>(source: SourceDefinition<F>, filters: F): Scalar[] {
  if (source.countParams !== undefined) {
    return resolveBaseParams(source.countParams, filters, 'count parameters');
  }
  return resolveBaseParams(source.params, filters, 'parameters');
}
