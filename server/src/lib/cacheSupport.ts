import { validationError } from './errors';
import type { CacheStats } from '../types';

/**
 * Hit/miss counters owned by one cache store instance.
 */
export class CacheCounters {
  private hits = 0;
  private misses = 0;

  recordHit(): void {
    this.hits += 1;
  }

  recordMiss(): void {
    this.misses += 1;
  }

  snapshot(now: Date = new Date()): CacheStats {
    const totalOps = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      totalOps,
      hitRatio: totalOps > 0 ? this.hits / totalOps : 0,
      lastUpdated: now,
    };
  }
}

export function assertKey(key: string): void {
  if (!key) {
    throw validationError('cache key cannot be empty');
  }
}

export function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw validationError('cache TTL must be positive');
  }
}
