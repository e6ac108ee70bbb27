export { RedisCacheAdapter } from './adapter/redis-cache-adapter';
export type { RedisCacheAdapterOptions } from './adapter/redis-cache-adapter';
