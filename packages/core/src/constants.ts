/**
 * Constants
 *
 * Centralized configuration constants to eliminate magic numbers.
 * All timing values are in milliseconds unless otherwise noted.
 */

// ============ Connection Defaults ============

export const CONNECTION_DEFAULTS = {
  /** Default MySQL port */
  MYSQL_PORT: 3306,
  /** Default PostgreSQL port */
  POSTGRESQL_PORT: 5432,
  /** Default connection timeout (10 seconds) */
  CONNECTION_TIMEOUT: 10_000,
  /** Maximum port number */
  MAX_PORT: 65_535,
  /** Minimum port number */
  MIN_PORT: 1,
} as const;

// ============ Pool Defaults ============

/**
 * Production-ready pool defaults
 * Matches PoolConfig interface for easy spreading
 */
export const POOL_DEFAULTS = {
  /** Maximum connections in pool */
  max: 10,
  /** Time before idle connection is closed (1 minute) */
  idleTimeout: 60_000,
  /** Maximum waiting requests in queue */
  queueLimit: 100,
} as const;

// ============ Query Defaults ============

export const QUERY_DEFAULTS = {
  /** Page size used when a request does not name one */
  limit: 100,
  /** Per-call engine timeout (30 seconds), 0 disables */
  queryTimeout: 30_000,
  /** Queries at or above this duration are logged as slow */
  slowQueryThreshold: 1000,
} as const;

// ============ Retry Defaults ============

export const RETRY_DEFAULTS = {
  /** Connection attempts after the first one */
  maxRetries: 3,
  /** Delay before the first retry */
  retryDelay: 1000,
  backoffMultiplier: 2,
  maxRetryDelay: 30_000,
} as const;

// ============ Cache Defaults ============

export const CACHE_DEFAULTS = {
  /** Result TTL (1 minute) */
  ttl: 60_000,
  keyPrefix: 'rowmux:',
} as const;

/**
 * Driver error codes that mean the source could not be reached.
 */
export const CONNECTIVITY_ERROR_CODES: readonly string[] = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'PROTOCOL_CONNECTION_LOST',
  // PostgreSQL admin shutdown
  '57P01',
];
