import type { CacheStats } from './weather';

/**
 * Key/value store with TTL semantics. `get` resolves `undefined` on a miss
 * and rejects only when the backend itself fails.
 */
export interface CacheStore {
  readonly type: 'memory' | 'redis';
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  exists(key: string): Promise<boolean>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  getStats(): CacheStats;
  close(): Promise<void>;
}
