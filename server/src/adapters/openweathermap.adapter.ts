import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { externalApiError, notFoundError, validationError } from '../lib/errors';
import { getUpstream, http as sharedHttp, isSuccessStatus, joinUrl } from '../lib/http';
import { createReading } from '../lib/weather.util';
import type { FetchOptions, WeatherProvider, WeatherReading } from '../types';

const WeatherResponseSchema = z.object({
  main: z.object({
    temp: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(z.object({ description: z.string() })).default([]),
});

export type OpenWeatherMapAdapterOptions = {
  apiKey: string;
  baseUrl: string;
  http?: AxiosInstance;
  now?: () => Date;
};

export class OpenWeatherMapAdapter implements WeatherProvider {
  readonly name = 'openweathermap';
  private readonly http: AxiosInstance;
  private readonly now: () => Date;

  constructor(private readonly options: OpenWeatherMapAdapterOptions) {
    this.http = options.http ?? sharedHttp;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(city: string, options: FetchOptions = {}): Promise<WeatherReading> {
    if (!city) {
      throw validationError('city cannot be empty');
    }
    if (!this.options.apiKey) {
      throw externalApiError('OpenWeatherMap API key not configured');
    }

    const { status, data } = await getUpstream(
      this.http,
      'OpenWeatherMap',
      joinUrl(this.options.baseUrl, '/weather'),
      { q: city, appid: this.options.apiKey, units: 'metric' },
      options.signal
    );

    if (!isSuccessStatus(status)) {
      if (status === 404) {
        throw notFoundError('city not found');
      }
      throw externalApiError(`OpenWeatherMap returned status ${status}`, undefined, status);
    }

    const parsed = WeatherResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw externalApiError('failed to decode OpenWeatherMap response', parsed.error);
    }

    const { main, weather } = parsed.data;
    return createReading({
      temperature: main.temp,
      humidity: main.humidity,
      description: weather[0]?.description ?? 'Clear',
      city,
      timestamp: this.now(),
    });
  }
}
