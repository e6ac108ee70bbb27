import {
  BaseQueryEngine,
  CONNECTION_DEFAULTS,
  EngineConnectivityError,
  POOL_DEFAULTS,
  validateConnectionConfig,
} from '@rowmux/core';

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { parsePgConnectionString, toPositionalPlaceholders } from '../utils/pg-utils';

import type { BaseQueryEngineOptions, PoolStats, Row, Scalar } from '@rowmux/core';
import type { PoolConfig } from 'pg';
import type { PgConnectionConfig } from '../utils/pg-utils';

export interface PostgreSQLQueryEngineOptions extends PgConnectionConfig, BaseQueryEngineOptions {
  /** Passed to `pg.Pool` last, overriding anything derived above */
  pgOptions?: PoolConfig;
}

/**
 * Read-only engine over a `pg` pool. Query text may use `?`, `%s` or
 * native `$n` placeholders.
 */
export class PostgreSQLQueryEngine extends BaseQueryEngine {
  readonly name = 'postgresql';

  private pool?: PostgreSQLConnectionPool;
  private readonly config: PgConnectionConfig;
  private readonly pgOptions?: PoolConfig;

  constructor(options: PostgreSQLQueryEngineOptions) {
    const { logger, queryTimeout, retryOptions, pgOptions, ...connection } = options;
    super({ logger, queryTimeout, retryOptions });

    validateConnectionConfig(connection);
    this.config = connection.connectionString
      ? { ...connection, ...parsePgConnectionString(connection.connectionString) }
      : connection;
    this.pgOptions = pgOptions;
  }

  get poolConfig(): PoolConfig {
    const { config } = this;
    const poolConfig: PoolConfig = {
      host: config.host,
      port: config.port ?? CONNECTION_DEFAULTS.POSTGRESQL_PORT,
      user: config.user,
      password: config.password,
      database: config.database,
      application_name: config.applicationName,
      max: config.pool?.max ?? POOL_DEFAULTS.max,
      idleTimeoutMillis: config.pool?.idleTimeout ?? config.idleTimeout ?? POOL_DEFAULTS.idleTimeout,
      connectionTimeoutMillis: config.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
      ...this.pgOptions,
    };

    if (config.ssl) {
      poolConfig.ssl = config.ssl;
    }
    return poolConfig;
  }

  getPoolStats(): PoolStats {
    return this.pool ? this.pool.getStats() : { total: 0, idle: 0, active: 0, waiting: 0 };
  }

  protected async doConnect(): Promise<void> {
    const pool = new PostgreSQLConnectionPool(this.poolConfig, this.logger);
    await pool.initialize();
    this.pool = pool;

    this.logger?.debug('PostgreSQL pool ready', { database: this.config.database });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  protected async doSelect(query: string, params: readonly Scalar[], signal: AbortSignal): Promise<Row[]> {
    if (!this.pool) {
      throw new EngineConnectivityError('PostgreSQL pool not initialized', this.name);
    }
    return this.pool.query(toPositionalPlaceholders(query), params, signal);
  }
}
