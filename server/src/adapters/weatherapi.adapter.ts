/**
 * WeatherAPI.com current conditions (`/current.json`).
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { externalApiError, notFoundError, validationError } from '../lib/errors';
import { getUpstream, http as sharedHttp, isSuccessStatus, joinUrl } from '../lib/http';
import { createReading } from '../lib/weather.util';
import type { FetchOptions, WeatherProvider, WeatherReading } from '../types';

const CurrentResponseSchema = z.object({
  current: z.object({
    temp_c: z.number(),
    humidity: z.number(),
    condition: z.object({ text: z.string() }),
  }),
});

const ErrorResponseSchema = z.object({
  error: z.object({ code: z.number() }),
});

// "No matching location found."
const NO_LOCATION_CODE = 1006;

export type WeatherApiAdapterOptions = {
  apiKey: string;
  baseUrl: string;
  http?: AxiosInstance;
  now?: () => Date;
};

export class WeatherApiAdapter implements WeatherProvider {
  readonly name = 'weatherapi';
  private readonly http: AxiosInstance;
  private readonly now: () => Date;

  constructor(private readonly options: WeatherApiAdapterOptions) {
    this.http = options.http ?? sharedHttp;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(city: string, options: FetchOptions = {}): Promise<WeatherReading> {
    if (!city) {
      throw validationError('city cannot be empty');
    }
    if (!this.options.apiKey) {
      throw externalApiError('WeatherAPI API key not configured');
    }

    const { status, data } = await getUpstream(
      this.http,
      'WeatherAPI',
      joinUrl(this.options.baseUrl, '/current.json'),
      { key: this.options.apiKey, q: city },
      options.signal
    );

    if (!isSuccessStatus(status)) {
      if (status === 404 || (status === 400 && isNoLocationError(data))) {
        throw notFoundError('city not found');
      }
      throw externalApiError(`WeatherAPI returned status ${status}`, undefined, status);
    }

    const parsed = CurrentResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw externalApiError('failed to decode WeatherAPI response', parsed.error);
    }

    const { current } = parsed.data;
    return createReading({
      temperature: current.temp_c,
      humidity: current.humidity,
      description: current.condition.text,
      city,
      timestamp: this.now(),
    });
  }
}

function isNoLocationError(data: unknown): boolean {
  const parsed = ErrorResponseSchema.safeParse(data);
  return parsed.success && parsed.data.error.code === NO_LOCATION_CODE;
}
