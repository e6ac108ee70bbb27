import { EngineConnectivityError, toError, withTimeout } from '@rowmux/core';
import { EventEmitter } from 'eventemitter3';
import Redis from 'ioredis';

import type { CacheAdapter, Logger } from '@rowmux/core';
import type { RedisOptions } from 'ioredis';

export interface RedisCacheAdapterOptions<V> {
  redis?: RedisOptions;
  /** Prepended to every key; `clear()` only touches keys under it */
  keyPrefix?: string;
  /** Default entry lifetime in ms; 0 keeps entries until evicted */
  ttl?: number;
  logger?: Logger;
  connectionTimeout?: number;
  commandTimeout?: number;
  retryOptions?: {
    maxRetries?: number;
    retryDelay?: number;
  };
  serialize?: (value: V) => string;
  deserialize?: (raw: string) => V;
}

const SCAN_BATCH = 100;

/**
 * Cache adapter backed by Redis. Values are stored as JSON unless a codec is
 * supplied; Dates and Buffers come back in their JSON form.
 */
export class RedisCacheAdapter<V = unknown> extends EventEmitter implements CacheAdapter<V> {
  private client?: Redis;
  private connecting?: Promise<Redis>;
  private readonly keyPrefix: string;
  private readonly ttl: number;
  private readonly logger?: Logger;
  private readonly connectionTimeout: number;
  private readonly commandTimeout: number;
  private readonly redisOptions: RedisOptions;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly serialize: (value: V) => string;
  private readonly deserialize: (raw: string) => V;

  constructor(options: RedisCacheAdapterOptions<V> = {}) {
    super();
    this.redisOptions = options.redis ?? {};
    this.keyPrefix = options.keyPrefix ?? 'cache:';
    this.ttl = options.ttl ?? 0;
    this.logger = options.logger;
    this.connectionTimeout = options.connectionTimeout ?? 10_000;
    this.commandTimeout = options.commandTimeout ?? 5000;
    this.maxRetries = options.retryOptions?.maxRetries ?? 3;
    this.retryDelay = options.retryOptions?.retryDelay ?? 1000;
    this.serialize = options.serialize ?? JSON.stringify;
    this.deserialize = options.deserialize ?? JSON.parse;
  }

  get isConnected(): boolean {
    return this.client !== undefined;
  }

  async get(key: string): Promise<V | null> {
    const value = await this.command(`get "${key}"`, (client) => client.get(this.fullKey(key)));
    return value === null ? null : this.deserialize(value);
  }

  async set(key: string, value: V, ttl: number = this.ttl): Promise<void> {
    const serialized = this.serialize(value);
    const fullKey = this.fullKey(key);

    await this.command(`set "${key}"`, (client) =>
      ttl > 0 ? client.set(fullKey, serialized, 'PX', ttl) : client.set(fullKey, serialized),
    );
    this.emit('set', { key, ttl });
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.command(`delete "${key}"`, (client) => client.del(this.fullKey(key)));
    return removed > 0;
  }

  async exists(key: string): Promise<boolean> {
    const found = await this.command(`check "${key}"`, (client) => client.exists(this.fullKey(key)));
    return found > 0;
  }

  async clear(): Promise<void> {
    const removed = await this.invalidate('*');
    this.emit('clear', { count: removed });
  }

  /**
   * Delete every key under the prefix that matches a glob pattern.
   */
  async invalidate(pattern: string): Promise<number> {
    const keys = await this.scanKeys(this.fullKey(pattern));
    if (keys.length === 0) {
      return 0;
    }
    return this.command(`invalidate "${pattern}"`, (client) => client.del(...keys));
  }

  async disconnect(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch(() => undefined);
    }
    const client = this.client;
    if (client) {
      this.client = undefined;
      await client.quit();
      this.logger?.info('Disconnected from Redis');
    }
  }

  fullKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async scanKeys(match: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.command(`scan "${match}"`, (client) =>
        client.scan(cursor, 'MATCH', match, 'COUNT', SCAN_BATCH),
      );
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');
    return keys;
  }

  private async command<R>(label: string, run: (client: Redis) => Promise<R>): Promise<R> {
    const client = await this.connect();
    try {
      return await withTimeout(run(client), this.commandTimeout, `Redis ${label} timed out`);
    } catch (error) {
      throw new EngineConnectivityError(`Redis failed to ${label}`, 'redis', toError(error));
    }
  }

  private async connect(): Promise<Redis> {
    if (this.client) {
      return this.client;
    }

    if (!this.connecting) {
      this.connecting = this.openClient().finally(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  private async openClient(): Promise<Redis> {
    const client = new Redis({
      ...this.redisOptions,
      lazyConnect: true,
      enableOfflineQueue: false,
      retryStrategy: (times: number) =>
        times > this.maxRetries ? null : Math.min(times * this.retryDelay, 5000),
    });

    client.on('error', (error: Error) => {
      this.logger?.error('Redis client error', { message: error.message });
      this.emit('error', error);
    });
    client.on('end', () => {
      if (this.client === client) {
        this.client = undefined;
        this.emit('disconnect');
      }
    });

    try {
      await withTimeout(client.connect(), this.connectionTimeout, 'Redis connection timeout');
    } catch (error) {
      client.disconnect();
      throw new EngineConnectivityError('Failed to connect to Redis', 'redis', toError(error));
    }

    this.client = client;
    this.logger?.info('Connected to Redis');
    this.emit('connect');
    return client;
  }
}
