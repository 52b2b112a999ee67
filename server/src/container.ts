/**
 * Composition root: builds the cache store, provider chain and weather
 * service from configuration. Every stateful piece is created here and
 * handed down explicitly.
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { buildProviders } from './adapters/providers';
import { createCacheStore } from './lib/cacheFactory';
import { cacheTtlMs } from './lib/env';
import type { AppConfig } from './lib/env';
import { createHttpClient } from './lib/http';
import { createProviderEventLogger } from './lib/logger';
import { LoggedWeatherResolver } from './services/logging.decorator';
import { ProviderChain } from './services/providerChain.service';
import { WeatherService } from './services/weather.service';
import type { CacheStore, WeatherResolver } from './types';

export type AppDependencies = {
  config: AppConfig;
  cacheStore: CacheStore;
  weatherService: WeatherService;
  logger: Logger;
};

export type BuildOverrides = {
  cacheStore?: CacheStore;
  http?: AxiosInstance;
};

export async function buildDependencies(
  config: AppConfig,
  logger: Logger,
  overrides: BuildOverrides = {}
): Promise<AppDependencies> {
  const http = overrides.http ?? createHttpClient(config.weather.requestTimeoutMs);
  const providers = buildProviders(config.weather, logger, http);

  let resolver: WeatherResolver = new ProviderChain(providers, logger);
  if (config.weather.enableLogging) {
    const eventLogger = createProviderEventLogger(logger, config.weather.logFilePath || undefined);
    resolver = new LoggedWeatherResolver(resolver, eventLogger);
    logger.info({ log_file: config.weather.logFilePath || null }, 'Weather provider logging enabled');
  }

  const cacheStore = overrides.cacheStore ?? (await createCacheStore(config.cache));
  logger.info(
    { type: cacheStore.type, redis_host: config.cache.type === 'redis' ? config.cache.redis.host : undefined },
    'Cache provider initialized'
  );

  const weatherService = new WeatherService({
    resolver,
    cacheStore,
    settings: {
      cacheEnabled: config.weather.enableCache,
      cacheTtlMs: cacheTtlMs(config.weather),
    },
    logger,
  });

  logger.info(
    { provider_order: providers.map((p) => p.name), cache_enabled: config.weather.enableCache },
    'Weather service ready'
  );

  return { config, cacheStore, weatherService, logger };
}
