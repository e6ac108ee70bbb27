export * from './cache-key';
export * from './logger';
export * from './retry';
export * from './validation';
