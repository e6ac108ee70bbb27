import type { CacheAdapter } from '../interfaces';

interface CacheEntry<V> {
  value: V;
  expiresAt?: number;
}

/**
 * Process-local cache. Useful for tests and single-instance deployments.
 */
export class MemoryCacheAdapter<V = unknown> implements CacheAdapter<V> {
  private readonly storage = new Map<string, CacheEntry<V>>();

  constructor(private readonly maxEntries = 1000) {}

  async get(key: string): Promise<V | null> {
    const entry = this.storage.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt !== undefined && Date.now() > entry.expiresAt) {
      this.storage.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: V, ttl?: number): Promise<void> {
    // oldest entry goes first once full
    if (!this.storage.has(key) && this.storage.size >= this.maxEntries) {
      const oldest = this.storage.keys().next();
      if (!oldest.done) {
        this.storage.delete(oldest.value);
      }
    }

    this.storage.set(key, {
      value,
      expiresAt: ttl ? Date.now() + ttl : undefined,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.storage.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  get size(): number {
    return this.storage.size;
  }
}
