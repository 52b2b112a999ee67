/**
 * Ordered provider fallback. Providers are tried one at a time in the
 * configured order; the first success wins and later providers are not
 * called.
 */

import type { Logger } from 'pino';
import { AppError, configurationError, errorMessage } from '../lib/errors';
import type { ChainInfo, FetchOptions, WeatherProvider, WeatherReading, WeatherResolver } from '../types';

/**
 * Raised when every provider failed. Only the last provider's error is kept
 * as `cause`; earlier failures are logged as they happen.
 */
export class ProviderChainError extends AppError {
  readonly providersTried: number;

  constructor(providersTried: number, lastError: unknown) {
    super(
      `all weather providers failed (tried ${providersTried} providers): ${errorMessage(lastError)}`,
      'external_api',
      lastError
    );
    this.name = 'ProviderChainError';
    this.providersTried = providersTried;
  }
}

export class ProviderChain implements WeatherResolver {
  private readonly providers: readonly WeatherProvider[];

  constructor(providers: readonly WeatherProvider[], private readonly logger: Logger) {
    this.providers = [...providers];
  }

  async resolve(city: string, options: FetchOptions = {}): Promise<WeatherReading> {
    if (this.providers.length === 0) {
      throw configurationError('no weather providers configured');
    }

    let lastError: unknown;

    for (const [index, provider] of this.providers.entries()) {
      options.signal?.throwIfAborted();

      this.logger.debug({ provider: provider.name, attempt: index + 1, city }, 'Trying weather provider');

      try {
        const reading = await provider.fetch(city, options);
        this.logger.debug(
          { provider: provider.name, city, temperature: reading.temperature },
          'Weather provider succeeded'
        );
        return reading;
      } catch (error) {
        lastError = error;
        this.logger.warn(
          { provider: provider.name, city, error: errorMessage(error) },
          'Weather provider failed, trying next'
        );
      }
    }

    this.logger.error(
      { city, providers_tried: this.providers.length, last_error: errorMessage(lastError) },
      'All weather providers failed'
    );

    throw new ProviderChainError(this.providers.length, lastError);
  }

  getProviderInfo(): ChainInfo {
    return {
      total_providers: this.providers.length,
      provider_order: this.providers.map((provider) => provider.name),
      chain_enabled: true,
      fallback_enabled: this.providers.length > 1,
    };
  }
}
