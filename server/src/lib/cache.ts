import NodeCache from 'node-cache';
import { CacheCounters, assertKey, assertTtl } from './cacheSupport';
import type { CacheStats, CacheStore } from '../types';

/**
 * In-process store. Expiry is checked on read: node-cache drops an entry
 * whose deadline has passed the next time it is looked up, and that lookup
 * counts as a miss. No background sweep runs (`checkperiod: 0`).
 */
export class MemoryCacheStore implements CacheStore {
  readonly type = 'memory' as const;
  private readonly cache = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
  private readonly counters = new CacheCounters();

  async get(key: string): Promise<string | undefined> {
    assertKey(key);
    const hit = this.cache.get<string>(key);
    if (hit === undefined) {
      this.counters.recordMiss();
      return undefined;
    }
    this.counters.recordHit();
    return hit;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    assertKey(key);
    assertTtl(ttlMs);
    this.cache.set(key, value, ttlMs / 1000);
  }

  async exists(key: string): Promise<boolean> {
    assertKey(key);
    // getTtl: undefined when absent, 0 when unlimited, else the deadline in ms
    const deadline = this.cache.getTtl(key);
    if (deadline === undefined) return false;
    return deadline === 0 || deadline >= Date.now();
  }

  async delete(key: string): Promise<void> {
    assertKey(key);
    this.cache.del(key);
  }

  async clear(): Promise<void> {
    this.cache.flushAll();
  }

  getStats(): CacheStats {
    return this.counters.snapshot();
  }

  async close(): Promise<void> {
    this.cache.close();
  }
}
