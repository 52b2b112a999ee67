import { MemoryCacheStore } from './cache';
import { connectRedisCacheStore } from './redisCache';
import { configurationError } from './errors';
import type { CacheConfig } from './env';
import type { CacheStore } from '../types';

export async function createCacheStore(config: CacheConfig): Promise<CacheStore> {
  switch (config.type) {
    case 'memory':
      return new MemoryCacheStore();
    case 'redis':
      return connectRedisCacheStore(config.redis);
    default:
      throw configurationError(`unsupported cache type: ${config.type}`);
  }
}
