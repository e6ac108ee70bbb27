export { SQLiteQueryEngine } from './engine/sqlite-query-engine';
export type { SQLiteQueryEngineOptions } from './engine/sqlite-query-engine';
export { toQuestionMarkPlaceholders, toSQLiteValue } from './utils/sqlite-utils';
export type { SQLiteValue } from './utils/sqlite-utils';
