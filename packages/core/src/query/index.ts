export * from './query-context';
export * from './query-resolution';
export * from './source';
