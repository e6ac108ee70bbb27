/**
 * A value that can travel through an engine's bound-parameter mechanism.
 */
export type Scalar = string | number | bigint | boolean | Date | Buffer | null;

/**
 * One raw row as returned by an engine: column name to value.
 */
export type Row = Record<string, unknown>;

/**
 * Request filters after validation. Any object shape; fields are read by name.
 */
export type Filters = object;

/**
 * Result returned by every handler. `total` is `null` when no count query ran.
 */
export interface Result<T = Row> {
  data: T[];
  total: number | null;
  windows?: SourceWindow[];
}

/**
 * Per-source fetch window computed for one union request.
 */
export interface SourceWindow {
  sourceId: string;
  fetchLimit: number;
  fetchOffset: number;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * TLS settings understood by every SQL driver
 */
export interface SSLOptions {
  rejectUnauthorized?: boolean;
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Database connection configuration
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'reader',
 *   password: 'test-secret',
 *   database: 'library',
 *   pool: { max: 20 },
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  connectionString?: string;
  ssl?: boolean | SSLOptions;

  /** Pool configuration */
  pool?: PoolConfig;

  connectionTimeout?: number;
  idleTimeout?: number;
}

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections in pool */
  max?: number;

  /** Time before idle connection is closed (ms) */
  idleTimeout?: number;

  /** Maximum waiting requests in queue (0 = unlimited) */
  queueLimit?: number;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
  active: number;
}
