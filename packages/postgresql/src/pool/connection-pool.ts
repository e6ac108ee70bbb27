import { EngineConnectivityError, RequestCancelledError, toError } from '@rowmux/core';
import { Pool } from 'pg';

import type { Logger, PoolStats, Row, Scalar } from '@rowmux/core';
import type { PoolConfig } from 'pg';

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private config: PoolConfig,
    private logger?: Logger,
  ) {}

  async initialize(): Promise<void> {
    const pool = new Pool(this.config);
    pool.on('error', (error) => {
      this.logger?.error('Unexpected error on idle PostgreSQL client', { message: error.message });
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      await pool.end().catch(() => undefined);
      throw new EngineConnectivityError(
        'Failed to initialize PostgreSQL connection pool',
        'postgresql',
        toError(error),
      );
    }
    this.pool = pool;
  }

  /**
   * Runs on a checked-out client. Aborting `signal` releases the client with
   * `release(true)`, which closes its connection instead of returning it to
   * the pool.
   */
  async query(sql: string, params: readonly Scalar[], signal?: AbortSignal): Promise<Row[]> {
    if (!this.pool) {
      throw new EngineConnectivityError('Connection pool not initialized', 'postgresql');
    }

    const client = await this.pool.connect();
    if (signal?.aborted) {
      client.release(true);
      throw new RequestCancelledError();
    }

    const onAbort = (): void => client.release(true);
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const result = await client.query<Row>(sql, [...params]);
      return result.rows;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!signal?.aborted) {
        client.release();
      }
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = undefined;
      await pool.end();
    }
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return { total: 0, idle: 0, active: 0, waiting: 0 };
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      active: this.pool.totalCount - this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}
