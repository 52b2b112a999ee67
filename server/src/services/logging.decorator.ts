/**
 * Structured request/response events around a provider or the provider
 * chain. The wrapped call's result or error passes through untouched.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../lib/errors';
import type { ChainInfo, FetchOptions, WeatherProvider, WeatherReading, WeatherResolver } from '../types';

const readingFields = (reading: WeatherReading) => ({
  temperature: reading.temperature,
  humidity: reading.humidity,
  description: reading.description,
});

export class LoggedWeatherProvider implements WeatherProvider {
  constructor(private readonly inner: WeatherProvider, private readonly logger: Logger) {}

  get name(): string {
    return `logged(${this.inner.name})`;
  }

  async fetch(city: string, options?: FetchOptions): Promise<WeatherReading> {
    const provider = this.inner.name;
    this.logger.info({ provider, city, event: 'request' }, 'Weather API request started');

    const startedAt = Date.now();
    try {
      const reading = await this.inner.fetch(city, options);
      this.logger.info(
        {
          provider,
          city,
          event: 'response',
          duration_ms: Date.now() - startedAt,
          ...readingFields(reading),
        },
        'Weather API request completed'
      );
      return reading;
    } catch (error) {
      this.logger.error(
        {
          provider,
          city,
          event: 'error',
          duration_ms: Date.now() - startedAt,
          error: errorMessage(error),
        },
        'Weather API request failed'
      );
      throw error;
    }
  }
}

export class LoggedWeatherResolver implements WeatherResolver {
  constructor(private readonly inner: WeatherResolver, private readonly logger: Logger) {}

  async resolve(city: string, options?: FetchOptions): Promise<WeatherReading> {
    this.logger.info({ city, event: 'chain_start' }, 'Weather provider chain started');

    const startedAt = Date.now();
    try {
      const reading = await this.inner.resolve(city, options);
      this.logger.info(
        {
          city,
          event: 'chain_success',
          duration_ms: Date.now() - startedAt,
          ...readingFields(reading),
        },
        'Weather provider chain completed'
      );
      return reading;
    } catch (error) {
      this.logger.error(
        {
          city,
          event: 'chain_error',
          duration_ms: Date.now() - startedAt,
          error: errorMessage(error),
        },
        'Weather provider chain failed'
      );
      throw error;
    }
  }

  getProviderInfo(): ChainInfo {
    return { ...this.inner.getProviderInfo(), logging_enabled: true };
  }
}
