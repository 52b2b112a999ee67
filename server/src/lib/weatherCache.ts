import { externalApiError, validationError } from './errors';
import { deserializeReading, serializeReading, validateReading } from './weather.util';
import type { CacheStore, WeatherReading } from '../types';

export const cacheKeyFor = (city: string): string => `weather:${city}`;

/**
 * Stores readings in a generic CacheStore as flat JSON records.
 */
export class WeatherCache {
  constructor(private readonly store: CacheStore) {}

  async get(key: string): Promise<WeatherReading | undefined> {
    const raw = await this.store.get(key);
    if (raw === undefined) return undefined;

    try {
      return deserializeReading(raw);
    } catch (error) {
      throw externalApiError('failed to deserialize weather data', error);
    }
  }

  async set(key: string, reading: WeatherReading, ttlMs: number): Promise<void> {
    const problem = validateReading(reading);
    if (problem) {
      throw validationError(`refusing to cache invalid weather data: ${problem}`);
    }
    await this.store.set(key, serializeReading(reading), ttlMs);
  }
}
