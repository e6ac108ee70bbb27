export { PostgreSQLQueryEngine } from './engine/postgresql-query-engine';
export type { PostgreSQLQueryEngineOptions } from './engine/postgresql-query-engine';
export { PostgreSQLConnectionPool } from './pool/connection-pool';
export { parsePgConnectionString, toPositionalPlaceholders } from './utils/pg-utils';
export type { PgConnectionConfig } from './utils/pg-utils';
