/**
 * Union Pagination Coordinator
 *
 * Presents several sources as one priority-ordered collection. Every source
 * is counted first, the page is split into per-source windows, and only
 * sources with a non-empty window are queried for rows. Rows are stitched
 * in priority order regardless of which source answers first.
 *
 * Operations of one phase run in parallel. The first failure aborts the
 * request-scoped signal, so siblings still in flight are cancelled, and is
 * reported alone: a union never returns partial data.
 */

import { ConfigurationError, QueryExecutionError, RequestCancelledError, toError } from '../errors';
import { validatePagination, withAbort } from '../utils';
import { planUnionWindows, sumTotals } from './pagination';
import { resolvePriority } from './priority';

import type { SingleSourceExecutor } from '../executor/single-source-executor';
import type { RowMapper } from '../mapping/row-mapper';
import type { ContextualValues } from '../query/query-context';
import type { Filters, Logger, SourceWindow } from '../types';
import type { PriorityOverride } from './priority';

/**
 * What to do with sources that have no count query.
 * - `require`: reject them at registration
 * - `unbounded`: treat their size as unknown; they absorb the remaining budget
 *   and make the aggregate total unknown
 */
export type UnknownTotalPolicy = 'require' | 'unbounded';

export interface UnionCoordinatorOptions<F extends Filters, T> {
  /** Executors keyed by source id, in registration order */
  executors: ReadonlyMap<string, SingleSourceExecutor<F>>;
  /** Consultation order when a request brings no override */
  defaultPriority: readonly string[];
  rowMapper: RowMapper<T>;
  unknownTotal?: UnknownTotalPolicy;
  logger?: Logger;
}

export interface UnionRequest<F extends Filters> {
  filters: F;
  limit: number;
  offset: number;
  priority?: PriorityOverride;
  contextualValues?: ContextualValues;
  signal?: AbortSignal;
}

export interface UnionOutcome<T> {
  data: T[];
  total: number | null;
  windows: SourceWindow[];
}

export class UnionCoordinator<F extends Filters, T> {
  private readonly executors: ReadonlyMap<string, SingleSourceExecutor<F>>;
  private readonly registered: readonly string[];
  private readonly defaultPriority: readonly string[];
  private readonly rowMapper: RowMapper<T>;
  private readonly unknownTotal: UnknownTotalPolicy;
  private readonly logger?: Logger;

  constructor(options: UnionCoordinatorOptions<F, T>) {
    this.executors = options.executors;
    this.registered = [...options.executors.keys()];
    this.defaultPriority = [...options.defaultPriority];
    this.rowMapper = options.rowMapper;
    this.unknownTotal = options.unknownTotal ?? 'require';
    this.logger = options.logger;

    if (this.registered.length === 0) {
      throw new ConfigurationError('A union needs at least one source', 'sources');
    }

    if (this.unknownTotal === 'require') {
      for (const [sourceId, executor] of this.executors) {
        if (!executor.hasCountQuery) {
          throw new ConfigurationError(
            `Source "${sourceId}" has no count query; set unknownTotal to 'unbounded' to allow it`,
            'countQuery',
          );
        }
      }
    }
  }

  get sourceIds(): readonly string[] {
    return this.registered;
  }

  async execute(request: UnionRequest<F>): Promise<UnionOutcome<T>> {
    const { filters, limit, offset, contextualValues, signal: parentSignal } = request;
    validatePagination(limit, offset);
    const order = resolvePriority(this.registered, this.defaultPriority, request.priority);

    if (parentSignal?.aborted) {
      throw new RequestCancelledError();
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    parentSignal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const totals = await this.fanOut(
        order.map((sourceId) => () => this.countSource(sourceId, filters, contextualValues, controller.signal)),
        controller,
        parentSignal,
      );

      const windows = planUnionWindows(
        order.map((sourceId, index) => ({ sourceId, total: totals[index] ?? null })),
        limit,
        offset,
      );
      this.logger?.debug(
        `Union windows: ${windows.map((w) => `${w.sourceId}=${w.fetchLimit}@${w.fetchOffset}`).join(', ')}`,
      );

      const pages = await this.fanOut(
        windows.map((window) => () => this.fetchWindow(window, filters, contextualValues, controller.signal)),
        controller,
        parentSignal,
      );

      return { data: pages.flat(), total: sumTotals(totals), windows };
    } finally {
      parentSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  private executorFor(sourceId: string): SingleSourceExecutor<F> {
    const executor = this.executors.get(sourceId);
    if (!executor) {
      throw new ConfigurationError(`Unknown source "${sourceId}"`, 'sources');
    }
    return executor;
  }

  private async countSource(
    sourceId: string,
    filters: F,
    contextualValues: ContextualValues | undefined,
    signal: AbortSignal,
  ): Promise<number | null> {
    const executor = this.executorFor(sourceId);
    if (!executor.hasCountQuery) {
      return null;
    }

    const result = await executor.execute({
      operation: 'count',
      filters,
      limit: 0,
      offset: 0,
      contextualValues,
      signal,
    });

    if (result.total === null && this.unknownTotal === 'require') {
      throw new QueryExecutionError(`Source "${sourceId}" did not report a total`);
    }
    return result.total;
  }

  private async fetchWindow(
    window: SourceWindow,
    filters: F,
    contextualValues: ContextualValues | undefined,
    signal: AbortSignal,
  ): Promise<T[]> {
    if (window.fetchLimit === 0) {
      return [];
    }

    const result = await this.executorFor(window.sourceId).execute({
      operation: 'select',
      filters,
      limit: window.fetchLimit,
      offset: window.fetchOffset,
      contextualValues,
      signal,
    });
    return this.rowMapper(result.rows, window.sourceId);
  }

  /**
   * Start every task at once and wait for all of them. The first failure
   * aborts `controller` and is the one reported.
   */
  private async fanOut<R>(
    tasks: readonly (() => Promise<R>)[],
    controller: AbortController,
    parentSignal: AbortSignal | undefined,
  ): Promise<R[]> {
    let firstError: Error | undefined;

    const running = tasks.map((task) =>
      task().catch((error: unknown) => {
        if (!firstError) {
          firstError = toError(error);
          controller.abort();
        }
        throw error;
      }),
    );

    try {
      return await withAbort(Promise.all(running), parentSignal);
    } catch (error) {
      if (parentSignal?.aborted) {
        throw new RequestCancelledError();
      }
      throw firstError ?? error;
    }
  }
}
