export * from './query-engine';
export * from './cache-adapter';
