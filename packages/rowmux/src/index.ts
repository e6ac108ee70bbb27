/**
 * rowmux - All-in-one package
 *
 * Re-exports the core and every engine so a single install is enough:
 *
 * ```bash
 * npm install rowmux
 * ```
 *
 * Or install only what you use:
 *
 * ```bash
 * npm install @rowmux/core @rowmux/postgresql
 * ```
 */

export * from '@rowmux/core';

export { MySQLQueryEngine, parseMySQLConnectionString } from '@rowmux/mysql';
export type { MySQLQueryEngineOptions } from '@rowmux/mysql';

export { PostgreSQLQueryEngine, parsePgConnectionString } from '@rowmux/postgresql';
export type { PostgreSQLQueryEngineOptions } from '@rowmux/postgresql';

export { SQLiteQueryEngine } from '@rowmux/sqlite';
export type { SQLiteQueryEngineOptions } from '@rowmux/sqlite';

export { RedisCacheAdapter } from '@rowmux/redis';
export type { RedisCacheAdapterOptions } from '@rowmux/redis';
