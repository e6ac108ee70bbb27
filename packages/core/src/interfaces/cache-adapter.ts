/**
 * Minimal cache contract used by the cache interceptor. `ttl` is in
 * milliseconds.
 */
export interface CacheAdapter<V = unknown> {
  get(key: string): Promise<V | null>;
  set(key: string, value: V, ttl?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  clear(): Promise<void>;
}
