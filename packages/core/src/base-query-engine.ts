import { EventEmitter } from 'eventemitter3';

import { CONNECTIVITY_ERROR_CODES, QUERY_DEFAULTS } from './constants';
import {
  EngineConnectivityError,
  QueryExecutionError,
  RequestCancelledError,
  RowmuxError,
  toError,
} from './errors';
import { retry, truncateSql, validateSQL, withAbort, withTimeout } from './utils';

import type { EngineCallOptions, QueryEngine } from './interfaces';
import type { Logger, Row, Scalar } from './types';
import type { RetryOptions } from './utils';

export interface BaseQueryEngineOptions {
  logger?: Logger;
  /** Per-call timeout in ms; 0 disables it */
  queryTimeout?: number;
  /** Applies to opening the connection only; queries are never retried */
  retryOptions?: Partial<RetryOptions>;
}

/**
 * True when a driver error means the source could not be reached rather than
 * the query being wrong.
 */
export function isConnectivityFailure(error: unknown): boolean {
  if (error instanceof EngineConnectivityError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string') {
    // SQLSTATE class 08: connection exception
    if (CONNECTIVITY_ERROR_CODES.includes(code) || /^08[0-9A-Z]{3}$/.test(code)) {
      return true;
    }
  }

  const message = error instanceof Error ? error.message : '';
  return CONNECTIVITY_ERROR_CODES.some((item) => message.includes(item));
}

/**
 * Reads the first column of the first row as a row count.
 */
export function toCount(rows: readonly Row[], sql?: string, params?: readonly Scalar[]): number {
  const first = rows[0];
  if (!first) {
    return 0;
  }

  const value: unknown = Object.values(first)[0];
  let count: number | undefined;
  if (typeof value === 'number') {
    count = value;
  } else if (typeof value === 'bigint') {
    count = Number(value);
  } else if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    count = Number(value.trim());
  }

  if (count === undefined || !Number.isInteger(count) || count < 0) {
    throw new QueryExecutionError(
      `Count query must return a non-negative integer, got ${String(value)}`,
      sql,
      params,
    );
  }
  return count;
}

export abstract class BaseQueryEngine extends EventEmitter implements QueryEngine {
  protected logger?: Logger;
  protected queryTimeout: number;
  protected retryOptions: Partial<RetryOptions>;
  protected _isConnected = false;
  private connecting?: Promise<void>;

  abstract readonly name: string;

  get isConnected(): boolean {
    return this._isConnected;
  }

  constructor(options: BaseQueryEngineOptions = {}) {
    super();
    if (options.logger) {
      this.logger = options.logger;
    }
    this.queryTimeout = options.queryTimeout ?? QUERY_DEFAULTS.queryTimeout;
    this.retryOptions = {
      shouldRetry: isConnectivityFailure,
      ...options.retryOptions,
    };
  }

  async select(query: string, params: readonly Scalar[], options: EngineCallOptions = {}): Promise<Row[]> {
    return this.run(query, params, options);
  }

  async selectCount(
    query: string,
    params: readonly Scalar[],
    options: EngineCallOptions = {},
  ): Promise<number> {
    const rows = await this.run(query, params, options);
    return toCount(rows, query, params);
  }

  async close(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch(() => undefined);
    }
    if (!this._isConnected) {
      return;
    }

    try {
      await this.doDisconnect();
      this._isConnected = false;
      this.emit('disconnect');
      this.logger?.info(`Disconnected from ${this.name}`);
    } catch (error) {
      throw new EngineConnectivityError(`Failed to disconnect from ${this.name}`, this.name, toError(error));
    }
  }

  /**
   * Opens the connection on first use. Concurrent callers share one attempt.
   */
  protected async ensureConnected(): Promise<void> {
    if (this._isConnected) {
      return;
    }

    if (!this.connecting) {
      this.connecting = retry(() => this.doConnect(), this.retryOptions)
        .then(() => {
          this._isConnected = true;
          this.emit('connect');
          this.logger?.info(`Connected to ${this.name}`);
        })
        .catch((error: unknown) => {
          throw error instanceof RowmuxError
            ? error
            : new EngineConnectivityError(`Failed to connect to ${this.name}`, this.name, toError(error));
        })
        .finally(() => {
          this.connecting = undefined;
        });
    }

    return this.connecting;
  }

  private async run(query: string, params: readonly Scalar[], options: EngineCallOptions): Promise<Row[]> {
    validateSQL(query);

    const { signal } = options;
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }

    await withAbort(this.ensureConnected(), signal);

    // Aborts once the caller stops waiting, so the driver can free what the query holds
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const startTime = Date.now();
    try {
      let pending = this.doSelect(query, params, controller.signal);
      if (this.queryTimeout > 0) {
        pending = withTimeout(pending, this.queryTimeout, `Query timed out after ${this.queryTimeout}ms`);
      }
      const rows = await withAbort(pending, signal);

      this.emit('query', {
        sql: query,
        params,
        duration: Date.now() - startTime,
        rowCount: rows.length,
      });
      return rows;
    } catch (error) {
      controller.abort();
      const classified = this.classifyError(error, query, params);
      this.emit('queryError', { sql: query, params, error: classified, duration: Date.now() - startTime });
      this.logger?.error(`Query failed on ${this.name}: ${classified.message}`, {
        sql: truncateSql(query),
        code: classified.code,
      });
      throw classified;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private classifyError(error: unknown, sql: string, params: readonly Scalar[]): RowmuxError {
    if (error instanceof RowmuxError) {
      return error;
    }

    const cause = toError(error);
    if (isConnectivityFailure(error)) {
      return new EngineConnectivityError(`${this.name} is unreachable: ${cause.message}`, this.name, cause);
    }
    return new QueryExecutionError(`Query failed: ${cause.message}`, sql, params, cause);
  }

  protected abstract doConnect(): Promise<void>;
  protected abstract doDisconnect(): Promise<void>;
  /**
   * `signal` aborts when the call is cancelled, times out or fails; a driver
   * should then discard the connection running the query.
   */
  protected abstract doSelect(query: string, params: readonly Scalar[], signal: AbortSignal): Promise<Row[]>;
}
