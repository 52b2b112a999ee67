/**
 * Redis-backed cache store. Expiry is delegated to Redis (`SET ... PX`);
 * a nil reply is a miss, any command failure is an external_api error.
 */

import Redis from 'ioredis';
import { CacheCounters, assertKey, assertTtl } from './cacheSupport';
import { externalApiError } from './errors';
import { logger } from './logger';
import type { RedisConfig } from './env';
import type { CacheStats, CacheStore } from '../types';

/**
 * The subset of Redis commands the store issues.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
  flushdb(): Promise<unknown>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export function fromIoredis(client: Redis): RedisCommands {
  return {
    get: (key) => client.get(key),
    setWithTtl: (key, value, ttlMs) => client.set(key, value, 'PX', Math.ceil(ttlMs)),
    del: (key) => client.del(key),
    exists: (key) => client.exists(key),
    flushdb: () => client.flushdb(),
    ping: () => client.ping(),
    quit: () => client.quit(),
  };
}

export class RedisCacheStore implements CacheStore {
  readonly type = 'redis' as const;
  private readonly counters = new CacheCounters();

  constructor(private readonly client: RedisCommands) {}

  async get(key: string): Promise<string | undefined> {
    assertKey(key);
    let value: string | null;
    try {
      value = await this.client.get(key);
    } catch (error) {
      throw externalApiError('redis get operation failed', error);
    }

    if (value === null) {
      this.counters.recordMiss();
      return undefined;
    }
    this.counters.recordHit();
    return value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    assertKey(key);
    assertTtl(ttlMs);
    try {
      await this.client.setWithTtl(key, value, ttlMs);
    } catch (error) {
      throw externalApiError('redis set operation failed', error);
    }
  }

  async exists(key: string): Promise<boolean> {
    assertKey(key);
    try {
      return (await this.client.exists(key)) > 0;
    } catch (error) {
      throw externalApiError('redis exists operation failed', error);
    }
  }

  async delete(key: string): Promise<void> {
    assertKey(key);
    try {
      await this.client.del(key);
    } catch (error) {
      throw externalApiError('redis delete operation failed', error);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.client.flushdb();
    } catch (error) {
      throw externalApiError('redis clear operation failed', error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.client.ping();
    } catch (error) {
      throw externalApiError('Redis ping failed', error);
    }
  }

  getStats(): CacheStats {
    return this.counters.snapshot();
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      throw externalApiError('failed to close Redis connection', error);
    }
  }
}

/**
 * Connects to Redis and verifies the connection with PING before handing
 * the store out.
 */
export async function connectRedisCacheStore(config: RedisConfig): Promise<RedisCacheStore> {
  const client = new Redis({
    host: config.host,
    port: config.port,
    db: config.db,
    ...(config.password ? { password: config.password } : {}),
    connectTimeout: config.dialTimeoutSec * 1000,
    commandTimeout: Math.max(config.readTimeoutSec, config.writeTimeoutSec) * 1000,
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });

  try {
    await client.connect();
  } catch (error) {
    client.disconnect();
    throw externalApiError('failed to connect to Redis', error);
  }

  const store = new RedisCacheStore(fromIoredis(client));
  try {
    await store.ping();
  } catch (error) {
    client.disconnect();
    throw externalApiError('failed to connect to Redis', error);
  }

  logger.info({ host: config.host, port: config.port, db: config.db }, 'Connected to Redis cache');
  return store;
}
