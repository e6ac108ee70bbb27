export { MySQLQueryEngine } from './engine/mysql-query-engine';
export type { MySQLQueryEngineOptions } from './engine/mysql-query-engine';
export { MySQLConnectionPool } from './pool/connection-pool';
export { isMySQLClientError, parseMySQLConnectionString } from './utils/mysql-utils';
export type { MySQLConnectionConfig } from './utils/mysql-utils';
