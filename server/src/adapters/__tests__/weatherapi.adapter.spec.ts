import type { InternalAxiosRequestConfig } from 'axios';
import { WeatherApiAdapter } from '../weatherapi.adapter';
import { isAppError } from '../../lib/errors';
import { stubHttp } from '../../../tests/helpers/stubs';
import type { StubReply } from '../../../tests/helpers/stubs';

const fixedNow = new Date('2026-03-01T12:00:00.000Z');

const adapterFor = (reply: StubReply, seen: InternalAxiosRequestConfig[] = []) =>
  new WeatherApiAdapter({
    apiKey: 'test-key',
    baseUrl: 'https://weather.test/v1/',
    http: stubHttp((config) => {
      seen.push(config);
      return reply;
    }),
    now: () => fixedNow,
  });

describe('WeatherApiAdapter', () => {
  it('maps current conditions to a reading', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const adapter = adapterFor(
      {
        status: 200,
        data: { current: { temp_c: 15, humidity: 76, condition: { text: 'Partly cloudy' } } },
      },
      seen
    );

    const reading = await adapter.fetch('London');

    expect(reading).toEqual({
      temperature: 15,
      humidity: 76,
      description: 'Partly cloudy',
      city: 'London',
      timestamp: fixedNow,
    });
    expect(seen[0]?.url).toBe('https://weather.test/v1/current.json');
    expect(seen[0]?.params).toEqual({ key: 'test-key', q: 'London' });
  });

  it('reports unknown cities as not_found', async () => {
    const byStatus = await adapterFor({ status: 404 }).fetch('Atlantis').catch((e: unknown) => e);
    const byCode = await adapterFor({ status: 400, data: { error: { code: 1006, message: 'No matching location found.' } } })
      .fetch('Atlantis')
      .catch((e: unknown) => e);

    expect(isAppError(byStatus, 'not_found')).toBe(true);
    expect(isAppError(byCode, 'not_found')).toBe(true);
  });

  it('reports other statuses as external_api errors', async () => {
    const error = await adapterFor({ status: 401, data: { error: { code: 2006 } } })
      .fetch('London')
      .catch((e: unknown) => e);

    expect(isAppError(error, 'external_api')).toBe(true);
    expect(error).toHaveProperty('message', 'WeatherAPI returned status 401');
    expect(error).toHaveProperty('status', 401);
  });

  it('rejects payloads without the expected fields', async () => {
    await expect(adapterFor({ status: 200, data: { current: {} } }).fetch('London')).rejects.toThrow(
      'failed to decode WeatherAPI response'
    );
  });

  it('wraps transport failures', async () => {
    const adapter = new WeatherApiAdapter({
      apiKey: 'test-key',
      baseUrl: 'https://weather.test/v1',
      http: stubHttp(() => {
        throw new Error('socket hang up');
      }),
    });

    const error = await adapter.fetch('London').catch((e: unknown) => e);
    expect(isAppError(error, 'external_api')).toBe(true);
    expect(error).toHaveProperty('message', 'failed to call WeatherAPI');
  });

  it('checks its inputs before calling out', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const keyless = new WeatherApiAdapter({
      apiKey: '',
      baseUrl: 'https://weather.test/v1',
      http: stubHttp((config) => {
        seen.push(config);
        return { status: 200 };
      }),
    });

    const empty = await adapterFor({ status: 200 }, seen).fetch('').catch((e: unknown) => e);
    expect(isAppError(empty, 'validation')).toBe(true);
    await expect(keyless.fetch('London')).rejects.toThrow('WeatherAPI API key not configured');
    expect(seen).toHaveLength(0);
  });
});
