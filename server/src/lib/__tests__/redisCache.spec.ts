import { RedisCacheStore } from '../redisCache';
import { isAppError } from '../errors';
import { FakeRedis, sleep } from '../../../tests/helpers/stubs';

describe('RedisCacheStore', () => {
  let redis: FakeRedis;
  let store: RedisCacheStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisCacheStore(redis);
  });

  it('reports its type', () => {
    expect(store.type).toBe('redis');
  });

  it('stores values with a millisecond TTL', async () => {
    await store.set('weather:Paris', 'payload', 100);
    await expect(store.get('weather:Paris')).resolves.toBe('payload');

    await sleep(150);
    await expect(store.get('weather:Paris')).resolves.toBeUndefined();
    expect(store.getStats()).toMatchObject({ hits: 1, misses: 1, totalOps: 2, hitRatio: 0.5 });
  });

  it('maps EXISTS replies to booleans', async () => {
    await store.set('a', '1', 60_000);
    await expect(store.exists('a')).resolves.toBe(true);
    await expect(store.exists('b')).resolves.toBe(false);
  });

  it('deletes and flushes', async () => {
    await store.set('a', '1', 60_000);
    await store.set('b', '2', 60_000);
    await store.delete('a');
    expect(redis.data.has('a')).toBe(false);

    await store.clear();
    expect(redis.data.size).toBe(0);
  });

  it('surfaces a failed read as an error rather than a miss', async () => {
    redis.failing = true;

    const error = await store.get('weather:Paris').catch((e: unknown) => e);
    expect(isAppError(error, 'external_api')).toBe(true);
    expect(error).toHaveProperty('message', 'redis get operation failed');
    expect(store.getStats().misses).toBe(0);
  });

  const failures: Array<[string, (s: RedisCacheStore) => Promise<unknown>, string]> = [
    ['set', (s) => s.set('k', 'v', 1000), 'redis set operation failed'],
    ['exists', (s) => s.exists('k'), 'redis exists operation failed'],
    ['delete', (s) => s.delete('k'), 'redis delete operation failed'],
    ['clear', (s) => s.clear(), 'redis clear operation failed'],
    ['ping', (s) => s.ping(), 'Redis ping failed'],
    ['close', (s) => s.close(), 'failed to close Redis connection'],
  ];

  it.each(failures)('wraps %s failures', async (_name, run, message) => {
    redis.failing = true;
    await expect(run(store)).rejects.toThrow(message);
  });

  it('validates keys and TTLs before talking to Redis', async () => {
    await expect(store.set('', 'v', 1000)).rejects.toThrow('cache key cannot be empty');
    await expect(store.set('k', 'v', 0)).rejects.toThrow('cache TTL must be positive');
    expect(redis.commands).toEqual([]);
  });

  it('pings and quits', async () => {
    await store.ping();
    await store.close();
    expect(redis.commands).toEqual(['PING', 'QUIT']);
  });
});
