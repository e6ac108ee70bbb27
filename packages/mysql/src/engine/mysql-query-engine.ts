import {
  BaseQueryEngine,
  CONNECTION_DEFAULTS,
  EngineConnectivityError,
  POOL_DEFAULTS,
  toError,
  validateConnectionConfig,
} from '@rowmux/core';

import { MySQLConnectionPool } from '../pool/connection-pool';
import { isMySQLClientError, parseMySQLConnectionString } from '../utils/mysql-utils';

import type { BaseQueryEngineOptions, Row, Scalar } from '@rowmux/core';
import type { PoolOptions } from 'mysql2/promise';
import type { MySQLConnectionConfig } from '../utils/mysql-utils';

export interface MySQLQueryEngineOptions extends MySQLConnectionConfig, BaseQueryEngineOptions {
  /** Passed to mysql2 last, overriding anything derived above */
  mysql2Options?: PoolOptions;
}

/**
 * Read-only engine over a mysql2 pool. The pool is created on the first
 * query and shared by every source registered against this engine.
 */
export class MySQLQueryEngine extends BaseQueryEngine {
  readonly name = 'mysql';

  private pool?: MySQLConnectionPool;
  private readonly config: MySQLConnectionConfig;
  private readonly mysql2Options?: PoolOptions;

  constructor(options: MySQLQueryEngineOptions) {
    const { logger, queryTimeout, retryOptions, mysql2Options, ...connection } = options;
    super({ logger, queryTimeout, retryOptions });

    validateConnectionConfig(connection);
    this.config = connection.connectionString
      ? { ...connection, ...parseMySQLConnectionString(connection.connectionString) }
      : connection;
    this.mysql2Options = mysql2Options;
  }

  /** Options handed to `mysql.createPool` */
  get poolOptions(): PoolOptions {
    const { config } = this;
    const poolOptions: PoolOptions = {
      host: config.host,
      port: config.port ?? CONNECTION_DEFAULTS.MYSQL_PORT,
      user: config.user,
      password: config.password,
      database: config.database,
      charset: config.charset,
      timezone: config.timezone,

      connectionLimit: config.pool?.max ?? POOL_DEFAULTS.max,
      waitForConnections: true,
      queueLimit: config.pool?.queueLimit ?? POOL_DEFAULTS.queueLimit,
      connectTimeout: config.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
      idleTimeout: config.pool?.idleTimeout ?? config.idleTimeout ?? POOL_DEFAULTS.idleTimeout,
      enableKeepAlive: true,
      ...this.mysql2Options,
    };

    if (config.ssl) {
      poolOptions.ssl = typeof config.ssl === 'boolean' ? {} : config.ssl;
    }
    return poolOptions;
  }

  protected async doConnect(): Promise<void> {
    const pool = new MySQLConnectionPool(this.poolOptions);
    await pool.initialize();
    this.pool = pool;

    this.logger?.debug('MySQL pool ready', {
      database: this.config.database,
      connectionLimit: this.config.pool?.max ?? POOL_DEFAULTS.max,
    });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  protected async doSelect(query: string, params: readonly Scalar[], signal: AbortSignal): Promise<Row[]> {
    if (!this.pool) {
      throw new EngineConnectivityError('MySQL pool not initialized', this.name);
    }

    try {
      return await this.pool.query(query, params, signal);
    } catch (error) {
      if (isMySQLClientError(error)) {
        throw new EngineConnectivityError(`${this.name} is unreachable`, this.name, toError(error));
      }
      throw error;
    }
  }
}
