/**
 * Weather resolution: cache-aside lookup in front of the provider chain.
 */

import type { Logger } from 'pino';
import { describeError, externalApiError, findErrorOfKind, validationError } from '../lib/errors';
import { WeatherCache, cacheKeyFor } from '../lib/weatherCache';
import { normalizeCity, validateCity, validateReading } from '../lib/weather.util';
import type {
  CacheStats,
  CacheStore,
  FetchOptions,
  ProviderInfo,
  WeatherReading,
  WeatherResolver,
} from '../types';

export type WeatherServiceSettings = {
  cacheEnabled: boolean;
  cacheTtlMs: number;
};

export type WeatherServiceDeps = {
  resolver: WeatherResolver;
  cacheStore: CacheStore;
  settings: WeatherServiceSettings;
  logger: Logger;
};

export class WeatherService {
  private readonly resolver: WeatherResolver;
  private readonly cacheStore: CacheStore;
  private readonly cache: WeatherCache;
  private readonly settings: WeatherServiceSettings;
  private readonly logger: Logger;

  constructor(deps: WeatherServiceDeps) {
    this.resolver = deps.resolver;
    this.cacheStore = deps.cacheStore;
    this.cache = new WeatherCache(deps.cacheStore);
    this.settings = deps.settings;
    this.logger = deps.logger;
  }

  async getWeather(city: string, options: FetchOptions = {}): Promise<WeatherReading> {
    const problem = validateCity(city);
    if (problem) {
      throw validationError(`invalid weather request: ${problem}`);
    }

    const normalized = normalizeCity(city);
    this.logger.debug({ city: normalized }, 'Getting weather for city');

    const reading = this.settings.cacheEnabled
      ? await this.getWithCache(normalized, options)
      : await this.getFromResolver(normalized, options);

    this.logger.debug({ city: normalized, temperature: reading.temperature }, 'Weather retrieved successfully');
    return reading;
  }

  getProviderInfo(): ProviderInfo {
    const info = this.resolver.getProviderInfo();
    return {
      provider_order: info.provider_order,
      total_providers: info.total_providers,
      fallback_enabled: info.fallback_enabled,
      chain_enabled: info.chain_enabled,
      cache_enabled: this.settings.cacheEnabled,
      logging_enabled: info.logging_enabled ?? false,
    };
  }

  getCacheMetrics(): CacheStats {
    return this.cacheStore.getStats();
  }

  private async getWithCache(city: string, options: FetchOptions): Promise<WeatherReading> {
    const key = cacheKeyFor(city);

    try {
      const cached = await this.cache.get(key);
      if (cached) {
        this.logger.debug({ city }, 'Weather found in cache');
        return cached;
      }
    } catch (error) {
      this.logger.warn({ city, error: describeError(error) }, 'Cache read failed; treating as miss');
    }

    const reading = await this.getFromResolver(city, options);

    try {
      await this.cache.set(key, reading, this.settings.cacheTtlMs);
    } catch (error) {
      this.logger.warn({ city, error: describeError(error) }, 'Failed to cache weather data');
    }

    return reading;
  }

  private async getFromResolver(city: string, options: FetchOptions): Promise<WeatherReading> {
    let reading: WeatherReading;
    try {
      reading = await this.resolver.resolve(city, options);
    } catch (error) {
      const notFound = findErrorOfKind(error, 'not_found');
      if (notFound) throw notFound;
      this.logger.error({ city, error: describeError(error) }, 'Failed to get weather');
      throw externalApiError('weather provider failed', error);
    }

    const problem = validateReading(reading);
    if (problem) {
      throw validationError(`invalid weather data from provider: ${problem}`);
    }
    return reading;
  }
}
