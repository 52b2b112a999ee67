import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { AccuWeatherAdapter } from './accuweather.adapter';
import { OpenWeatherMapAdapter } from './openweathermap.adapter';
import { WeatherApiAdapter } from './weatherapi.adapter';
import { PROVIDER_NAMES, isProviderName } from '../lib/env';
import type { ProviderName, WeatherConfig } from '../lib/env';
import type { WeatherProvider } from '../types';

function createAvailableProviders(
  config: WeatherConfig,
  http: AxiosInstance | undefined,
  logger: Logger
): Map<ProviderName, WeatherProvider> {
  const providers = new Map<ProviderName, WeatherProvider>();
  const shared = http ? { http } : {};

  if (config.weatherApiKey) {
    providers.set(
      'weatherapi',
      new WeatherApiAdapter({ apiKey: config.weatherApiKey, baseUrl: config.weatherApiBaseUrl, ...shared })
    );
    logger.debug({ provider: 'weatherapi' }, 'Created WeatherAPI provider');
  }

  if (config.openWeatherMapKey) {
    providers.set(
      'openweathermap',
      new OpenWeatherMapAdapter({
        apiKey: config.openWeatherMapKey,
        baseUrl: config.openWeatherMapBaseUrl,
        ...shared,
      })
    );
    logger.debug({ provider: 'openweathermap' }, 'Created OpenWeatherMap provider');
  }

  if (config.accuWeatherKey) {
    providers.set(
      'accuweather',
      new AccuWeatherAdapter({ apiKey: config.accuWeatherKey, baseUrl: config.accuWeatherBaseUrl, ...shared })
    );
    logger.debug({ provider: 'accuweather' }, 'Created AccuWeather provider');
  }

  return providers;
}

/**
 * Providers that have an API key, in the configured priority order. When the
 * order names none of them, every keyed provider is used in default order.
 */
export function buildProviders(
  config: WeatherConfig,
  logger: Logger,
  http?: AxiosInstance
): WeatherProvider[] {
  const available = createAvailableProviders(config, http, logger);

  const ordered: WeatherProvider[] = [];
  for (const name of config.providerOrder) {
    if (!isProviderName(name)) continue;
    const provider = available.get(name);
    if (provider && !ordered.includes(provider)) ordered.push(provider);
  }

  if (ordered.length > 0) return ordered;

  return PROVIDER_NAMES.flatMap((name) => {
    const provider = available.get(name);
    return provider ? [provider] : [];
  });
}
