/**
 * Registration entry points.
 *
 * `registerSingle` and `registerUnion` freeze their configuration and return
 * a handler the transport layer binds to a route. Handlers resolve only with
 * a complete Result and fail only with a RowmuxError.
 *
 * @example
 * ```typescript
 * const listBooks = registerUnion({
 *   sources: {
 *     archive: { engine: archiveDb, selectQuery: 'SELECT * FROM books LIMIT ? OFFSET ?', countQuery: 'SELECT COUNT(*) FROM books' },
 *     catalog: { engine: catalogDb, selectQuery: 'SELECT * FROM books LIMIT $1 OFFSET $2', countQuery: 'SELECT COUNT(*) FROM books' },
 *   },
 *   sourcePriority: ['catalog', 'archive'],
 *   outputSchema: bookSchema,
 * });
 *
 * const page = await listBooks({ filters: {}, limit: 20, offset: 40, priority: 'archive' });
 * ```
 */

import { QUERY_DEFAULTS } from './constants';
import { ConfigurationError, toRowmuxError } from './errors';
import { SingleSourceExecutor } from './executor/single-source-executor';
import { createRowMapper, parseFilters, passThroughRows } from './mapping/row-mapper';
import { resolveDefaultPriority } from './union/priority';
import { UnionCoordinator } from './union/union-coordinator';
import { withAbort } from './utils';

import type { Interceptor } from './interceptors/types';
import type { FilterSchema, OutputSchema, RowMapper, RowMappingMode } from './mapping/row-mapper';
import type { ContextualValues } from './query/query-context';
import type { SourceDefinition } from './query/source';
import type { Filters, Logger, Result, Row } from './types';
import type { PriorityOverride } from './union/priority';
import type { UnknownTotalPolicy } from './union/union-coordinator';

/**
 * Resolves one contextual value from the inbound request, e.g. the
 * authenticated user. Run by the transport before the handler is called.
 */
export type ContextualProvider = (request: unknown) => unknown;

export type ContextualProviders = Record<string, ContextualProvider>;

export interface HandlerRequest<F extends Filters> {
  filters: F;
  /** Defaults to the handler's `defaultLimit` */
  limit?: number;
  offset?: number;
  contextualValues?: ContextualValues;
  signal?: AbortSignal;
}

export interface UnionHandlerRequest<F extends Filters> extends HandlerRequest<F> {
  /** Comma-separated string or list of source ids to consult first */
  priority?: PriorityOverride;
  /** Report the computed per-source windows in `Result.windows` */
  includeWindows?: boolean;
}

interface HandlerOptions<F extends Filters> {
  filterSchema?: FilterSchema<F>;
  /** Run before any source-level interceptors */
  interceptors?: readonly Interceptor<F>[];
  contextualProviders?: ContextualProviders;
  defaultLimit?: number;
  logger?: Logger;
}

export interface RegisterSingleOptions<F extends Filters, T> extends HandlerOptions<F> {
  source: SourceDefinition<F>;
  /** Reported in errors and logs; defaults to `default` */
  sourceId?: string;
  outputSchema?: OutputSchema<T>;
  rowMapping?: RowMappingMode;
}

export interface RegisterUnionOptions<F extends Filters, T> extends HandlerOptions<F> {
  /**
   * Sources keyed by id; iteration order is the registration order.
   * A plain object cannot hold all-digit ids, which objects list first;
   * use a Map for those.
   */
  sources: Record<string, SourceDefinition<F>> | Map<string, SourceDefinition<F>>;
  sourcePriority?: readonly string[];
  /** Union rows are always mapped strictly */
  outputSchema?: OutputSchema<T>;
  unknownTotal?: UnknownTotalPolicy;
}

interface HandlerInfo {
  readonly contextualProviders: Readonly<ContextualProviders>;
}

export interface SingleHandler<F extends Filters, T> extends HandlerInfo {
  (request: HandlerRequest<F>): Promise<Result<T>>;
  readonly sourceId: string;
}

export interface UnionHandler<F extends Filters, T> extends HandlerInfo {
  (request: UnionHandlerRequest<F>): Promise<Result<T>>;
  readonly sourceIds: readonly string[];
}

const DEFAULT_SOURCE_ID = 'default';
const SOURCE_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;
const INTEGER_KEY_PATTERN = /^\d+$/;

function validateDefaultLimit(defaultLimit: number): number {
  if (!Number.isInteger(defaultLimit) || defaultLimit < 0) {
    throw new ConfigurationError('defaultLimit must be a non-negative integer', 'defaultLimit');
  }
  return defaultLimit;
}

function validateSourceId(sourceId: string): string {
  if (!SOURCE_ID_PATTERN.test(sourceId)) {
    throw new ConfigurationError(
      `Source id "${sourceId}" may contain only letters, numbers, dots, dashes and underscores`,
      'sources',
    );
  }
  return sourceId;
}

function freezeSource<F extends Filters>(source: SourceDefinition<F>): SourceDefinition<F> {
  const frozen: SourceDefinition<F> = { ...source };
  if (source.interceptors) {
    frozen.interceptors = Object.freeze([...source.interceptors]);
  }
  return Object.freeze(frozen);
}

function sourceEntries<F extends Filters>(
  sources: RegisterUnionOptions<F, unknown>['sources'],
): [string, SourceDefinition<F>][] {
  if (sources instanceof Map) {
    return [...sources.entries()];
  }

  const entries = Object.entries(sources);
  const integerKey = entries.find(([sourceId]) => INTEGER_KEY_PATTERN.test(sourceId));
  if (integerKey) {
    throw new ConfigurationError(
      `Source id "${integerKey[0]}" is an integer-like key; pass sources as a Map to keep registration order`,
      'sources',
    );
  }
  return entries;
}

/**
 * Call every provider with the inbound request and key each value by the
 * provider's name.
 */
export async function resolveContextualValues(
  providers: Readonly<ContextualProviders>,
  request: unknown,
): Promise<ContextualValues> {
  const entries = await Promise.all(
    Object.entries(providers).map(async ([name, provider]) => [name, await provider(request)] as const),
  );
  return Object.fromEntries(entries);
}

export function registerSingle<F extends Filters, T>(
  options: RegisterSingleOptions<F, T> & { outputSchema: OutputSchema<T> },
): SingleHandler<F, T>;
export function registerSingle<F extends Filters>(options: RegisterSingleOptions<F, Row>): SingleHandler<F, Row>;
export function registerSingle<F extends Filters, T>(options: RegisterSingleOptions<F, T>): SingleHandler<F, T | Row> {
  const sourceId = validateSourceId(options.sourceId ?? DEFAULT_SOURCE_ID);
  const defaultLimit = validateDefaultLimit(options.defaultLimit ?? QUERY_DEFAULTS.limit);
  const { filterSchema, outputSchema, logger } = options;
  const contextualProviders = Object.freeze({ ...options.contextualProviders });

  const executor = new SingleSourceExecutor<F>(sourceId, freezeSource(options.source), [
    ...(options.interceptors ?? []),
  ]);
  const mapRows: RowMapper<T | Row> = outputSchema
    ? createRowMapper(outputSchema, { mode: options.rowMapping, logger })
    : passThroughRows;

  const handler = async (request: HandlerRequest<F>): Promise<Result<T | Row>> => {
    try {
      const filters = parseFilters(filterSchema, request.filters);
      const result = await withAbort(
        executor.execute({
          operation: 'select+count',
          filters,
          limit: request.limit ?? defaultLimit,
          offset: request.offset ?? 0,
          contextualValues: request.contextualValues,
          signal: request.signal,
        }),
        request.signal,
      );
      return { data: mapRows(result.rows, sourceId), total: result.total };
    } catch (error) {
      throw toRowmuxError(error);
    }
  };

  return Object.assign(handler, { sourceId, contextualProviders });
}

export function registerUnion<F extends Filters, T>(
  options: RegisterUnionOptions<F, T> & { outputSchema: OutputSchema<T> },
): UnionHandler<F, T>;
export function registerUnion<F extends Filters>(options: RegisterUnionOptions<F, Row>): UnionHandler<F, Row>;
export function registerUnion<F extends Filters, T>(options: RegisterUnionOptions<F, T>): UnionHandler<F, T | Row> {
  const defaultLimit = validateDefaultLimit(options.defaultLimit ?? QUERY_DEFAULTS.limit);
  const { filterSchema, outputSchema, logger } = options;
  const contextualProviders = Object.freeze({ ...options.contextualProviders });
  const interceptors = [...(options.interceptors ?? [])];

  const executors = new Map<string, SingleSourceExecutor<F>>();
  for (const [sourceId, source] of sourceEntries(options.sources)) {
    validateSourceId(sourceId);
    executors.set(sourceId, new SingleSourceExecutor<F>(sourceId, freezeSource(source), interceptors));
  }

  const coordinator = new UnionCoordinator<F, T | Row>({
    executors,
    defaultPriority: resolveDefaultPriority([...executors.keys()], options.sourcePriority),
    rowMapper: outputSchema ? createRowMapper(outputSchema, { mode: 'strict', logger }) : passThroughRows,
    unknownTotal: options.unknownTotal,
    logger,
  });
  const sourceIds = Object.freeze([...coordinator.sourceIds]);

  const handler = async (request: UnionHandlerRequest<F>): Promise<Result<T | Row>> => {
    try {
      const filters = parseFilters(filterSchema, request.filters);
      const outcome = await coordinator.execute({
        filters,
        limit: request.limit ?? defaultLimit,
        offset: request.offset ?? 0,
        priority: request.priority,
        contextualValues: request.contextualValues,
        signal: request.signal,
      });

      const result: Result<T | Row> = { data: outcome.data, total: outcome.total };
      if (request.includeWindows) {
        result.windows = outcome.windows;
      }
      return result;
    } catch (error) {
      throw toRowmuxError(error);
    }
  };

  return Object.assign(handler, { sourceIds, contextualProviders });
}
