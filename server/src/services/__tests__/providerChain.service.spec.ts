import { ProviderChain, ProviderChainError } from '../providerChain.service';
import { findErrorOfKind, isAppError } from '../../lib/errors';
import { StubProvider, captureLogger, sampleReading, silentLogger } from '../../../tests/helpers/stubs';

describe('ProviderChain', () => {
  it('returns the first provider result without calling the rest', async () => {
    const first = new StubProvider('weatherapi');
    const second = new StubProvider('openweathermap');
    const chain = new ProviderChain([first, second], silentLogger());

    await expect(chain.resolve('London')).resolves.toEqual(sampleReading('London'));
    expect(first.calls).toBe(1);
    expect(second.calls).toBe(0);
  });

  it('falls back in order and logs each failure', async () => {
    const first = new StubProvider('weatherapi', 'fail');
    const second = new StubProvider('openweathermap', 'fail');
    const third = new StubProvider('accuweather');
    const { logger, lines } = captureLogger();
    const chain = new ProviderChain([first, second, third], logger);

    const reading = await chain.resolve('Paris');

    expect(reading.city).toBe('Paris');
    expect([first.calls, second.calls, third.calls]).toEqual([1, 1, 1]);
    const warnings = lines.filter((line) => line.level === 40);
    expect(warnings.map((line) => line['provider'])).toEqual(['weatherapi', 'openweathermap']);
  });

  it('stops at the first provider that succeeds after a failure', async () => {
    const failing = new StubProvider('weatherapi', 'fail');
    const succeeding = new StubProvider('openweathermap');
    const unused = new StubProvider('accuweather');
    const chain = new ProviderChain([failing, succeeding, unused], silentLogger());

    await expect(chain.resolve('Lisbon')).resolves.toEqual(sampleReading('Lisbon'));
    expect([failing.calls, succeeding.calls, unused.calls]).toEqual([1, 1, 0]);
  });

  it('fails with a summary of the last error when every provider fails', async () => {
    const chain = new ProviderChain(
      [new StubProvider('weatherapi', 'fail'), new StubProvider('openweathermap', 'fail')],
      silentLogger()
    );

    const error = await chain.resolve('Paris').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderChainError);
    expect(isAppError(error, 'external_api')).toBe(true);
    expect(error).toHaveProperty(
      'message',
      'all weather providers failed (tried 2 providers): openweathermap returned status 500'
    );
    expect(error).toHaveProperty('providersTried', 2);
  });

  it('keeps the last error as the cause', async () => {
    const chain = new ProviderChain(
      [new StubProvider('weatherapi', 'fail'), new StubProvider('openweathermap', 'not_found')],
      silentLogger()
    );

    const error = await chain.resolve('Atlantis').catch((e: unknown) => e);
    expect(findErrorOfKind(error, 'not_found')?.message).toBe('city not found');
  });

  it('refuses to resolve without providers', async () => {
    const error = await new ProviderChain([], silentLogger()).resolve('Paris').catch((e: unknown) => e);
    expect(isAppError(error, 'configuration')).toBe(true);
    expect(error).toHaveProperty('message', 'no weather providers configured');
  });

  it('stops before the next provider once the caller aborts', async () => {
    const controller = new AbortController();
    const first = new StubProvider('weatherapi', 'fail');
    const second = new StubProvider('openweathermap');
    const originalFetch = first.fetch.bind(first);
    first.fetch = async (city, options) => {
      controller.abort();
      return originalFetch(city, options);
    };

    const chain = new ProviderChain([first, second], silentLogger());
    await expect(chain.resolve('Paris', { signal: controller.signal })).rejects.toThrow();
    expect(second.calls).toBe(0);
  });

  it('describes the chain', () => {
    expect(new ProviderChain([new StubProvider('weatherapi')], silentLogger()).getProviderInfo()).toEqual({
      total_providers: 1,
      provider_order: ['weatherapi'],
      chain_enabled: true,
      fallback_enabled: false,
    });
    expect(
      new ProviderChain([new StubProvider('weatherapi'), new StubProvider('accuweather')], silentLogger())
        .getProviderInfo().fallback_enabled
    ).toBe(true);
  });
});
