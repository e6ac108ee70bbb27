import { EngineConnectivityError, RequestCancelledError, toError } from '@rowmux/core';
import * as mysql from 'mysql2/promise';

import type { Row, Scalar } from '@rowmux/core';

export class MySQLConnectionPool {
  private pool?: mysql.Pool;

  constructor(private options: mysql.PoolOptions) {}

  get isInitialized(): boolean {
    return this.pool !== undefined;
  }

  async initialize(): Promise<void> {
    const pool = mysql.createPool(this.options);
    try {
      const connection = await pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      await pool.end().catch(() => undefined);
      throw new EngineConnectivityError('Failed to initialize MySQL connection pool', 'mysql', toError(error));
    }
    this.pool = pool;
  }

  /**
   * Text protocol query; placeholders are escaped client-side so `LIMIT ?`
   * accepts numeric parameters. Aborting `signal` destroys the connection,
   * which stops the query and keeps it out of the pool.
   */
  async query(sql: string, params: readonly Scalar[], signal?: AbortSignal): Promise<Row[]> {
    if (!this.pool) {
      throw new EngineConnectivityError('Connection pool not initialized', 'mysql');
    }

    const connection = await this.pool.getConnection();
    if (signal?.aborted) {
      connection.destroy();
      throw new RequestCancelledError();
    }

    const onAbort = (): void => connection.destroy();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const [rows] = await connection.query<mysql.RowDataPacket[]>(sql, [...params]);
      return rows;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!signal?.aborted) {
        connection.release();
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
}
