/**
 * Single-Source Executor
 *
 * Runs one source's query against its engine under one interceptor chain:
 * resolves query text and parameters, builds a fresh QueryContext, runs the
 * chain, and lets the terminal call the engine. Limit and offset are passed
 * through exactly as given.
 */

import { InterceptorChain } from '../interceptors/interceptor-chain';
import { createQueryContext } from '../query/query-context';
import { resolveCountParams, resolveQueryText, resolveSelectParams } from '../query/query-resolution';
import { validatePagination } from '../utils';

import type { ExecutionResult, Interceptor } from '../interceptors/types';
import type { ContextualValues, QueryContext, QueryOperation } from '../query/query-context';
import type { SourceDefinition } from '../query/source';
import type { Filters, Row } from '../types';

export interface ExecuteOptions<F extends Filters> {
  operation: QueryOperation;
  filters: F;
  limit: number;
  offset: number;
  contextualValues?: ContextualValues;
  signal?: AbortSignal;
}

export class SingleSourceExecutor<F extends Filters = Filters> {
  private readonly chain: InterceptorChain<F>;

  constructor(
    readonly sourceId: string,
    private readonly source: SourceDefinition<F>,
    interceptors: readonly Interceptor<F>[] = [],
  ) {
    this.chain = new InterceptorChain<F>([...interceptors, ...(source.interceptors ?? [])]);
  }

  get hasCountQuery(): boolean {
    return this.source.countQuery !== undefined;
  }

  get engineName(): string {
    return this.source.engine.name;
  }

  buildContext(options: ExecuteOptions<F>): QueryContext<F> {
    const { operation, filters, limit, offset } = options;
    validatePagination(limit, offset);

    const wantsSelect = operation !== 'count';
    const wantsCount = operation !== 'select' && this.source.countQuery !== undefined;

    const selectQuery = wantsSelect ? resolveQueryText(this.source.selectQuery, filters, 'select query') : '';
    const selectParams = wantsSelect ? resolveSelectParams(this.source, filters, limit, offset) : [];

    let countQuery: string | null = null;
    if (wantsCount && this.source.countQuery !== undefined) {
      countQuery = resolveQueryText(this.source.countQuery, filters, 'count query');
    }
    const countParams = countQuery === null ? [] : resolveCountParams(this.source, filters);

    return createQueryContext({
      sourceId: this.sourceId,
      operation,
      selectQuery,
      selectParams,
      countQuery,
      countParams,
      filters,
      limit,
      offset,
      contextualValues: options.contextualValues,
      signal: options.signal,
    });
  }

  async execute(options: ExecuteOptions<F>): Promise<ExecutionResult> {
    const context = this.buildContext(options);
    return this.chain.execute(context, (ctx) => this.terminal(ctx));
  }

  /**
   * End of the chain: the only place the engine is called.
   */
  private async terminal(context: QueryContext<F>): Promise<ExecutionResult> {
    const { engine } = this.source;
    const callOptions = { signal: context.signal };
    const startTime = Date.now();

    const rowsPromise: Promise<Row[]> =
      context.operation === 'count'
        ? Promise.resolve([])
        : engine.select(context.selectQuery, context.selectParams, callOptions);
    const totalPromise: Promise<number | null> =
      context.operation !== 'select' && context.countQuery !== null
        ? engine.selectCount(context.countQuery, context.countParams, callOptions)
        : Promise.resolve(null);

    const [rows, total] = await Promise.all([rowsPromise, totalPromise]);
    return { rows, total, duration: Date.now() - startTime };
  }
}
