import { InvalidFiltersError, RowMappingError, toError } from '../errors';

import type { Filters, Logger, Row } from '../types';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export type RowMapperFn<T> = (row: Row) => T;

/**
 * Declared output shape: a zod schema, or a function that throws on rows it
 * cannot map.
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown> | RowMapperFn<T>;

export type FilterSchema<F extends Filters> = ZodType<F, ZodTypeDef, unknown>;

/**
 * `strict` fails the whole source on the first bad row; `drop` skips the row
 * and logs it.
 */
export type RowMappingMode = 'strict' | 'drop';

export type RowMapper<T> = (rows: readonly Row[], sourceId: string) => T[];

type MappedRow<T> = { ok: true; value: T } | { ok: false; issues: string[]; cause?: Error };

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function mapRow<T>(schema: OutputSchema<T>, row: Row): MappedRow<T> {
  if (typeof schema === 'function') {
    try {
      return { ok: true, value: schema(row) };
    } catch (error) {
      const cause = toError(error);
      return { ok: false, issues: [cause.message], cause };
    }
  }

  const parsed = schema.safeParse(row);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return { ok: false, issues: formatIssues(parsed.error), cause: parsed.error };
}

export function createRowMapper<T>(
  schema: OutputSchema<T>,
  options: { mode?: RowMappingMode; logger?: Logger } = {},
): RowMapper<T> {
  const { mode = 'strict', logger } = options;

  return (rows, sourceId) => {
    const mapped: T[] = [];
    rows.forEach((row, index) => {
      const outcome = mapRow(schema, row);
      if (outcome.ok) {
        mapped.push(outcome.value);
        return;
      }

      const detail = outcome.issues.join('; ');
      if (mode === 'drop') {
        logger?.warn(`Dropping row ${index} from source "${sourceId}": ${detail}`);
        return;
      }
      throw new RowMappingError(
        `Row ${index} from source "${sourceId}" does not match the output shape: ${detail}`,
        sourceId,
        index,
        outcome.issues,
        outcome.cause,
      );
    });
    return mapped;
  };
}

export const passThroughRows: RowMapper<Row> = (rows) => rows.map((row) => ({ ...row }));

/**
 * Validate raw filters against the declared schema and return its output.
 * Without a schema the filters are used as given.
 */
export function parseFilters<F extends Filters>(schema: FilterSchema<F>, filters: unknown): F;
export function parseFilters<F extends Filters>(schema: FilterSchema<F> | undefined, filters: F): F;
export function parseFilters<F extends Filters>(schema: FilterSchema<F> | undefined, filters: F): F {
  if (!schema) {
    return filters;
  }
  const parsed = schema.safeParse(filters);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidFiltersError(`Invalid filters: ${issues.join('; ')}`, issues, parsed.error);
  }
  return parsed.data;
}
