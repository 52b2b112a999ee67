/**
 * AccuWeather needs a location key before current conditions can be read:
 * city search first, then `/currentconditions/v1/{key}`.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { externalApiError, notFoundError, validationError } from '../lib/errors';
import { getUpstream, http as sharedHttp, isSuccessStatus, joinUrl } from '../lib/http';
import { createReading } from '../lib/weather.util';
import type { FetchOptions, WeatherProvider, WeatherReading } from '../types';

const CitySearchSchema = z.array(z.object({ Key: z.string() }));

const CurrentConditionsSchema = z
  .array(
    z.object({
      WeatherText: z.string(),
      RelativeHumidity: z.number(),
      Temperature: z.object({
        Metric: z.object({ Value: z.number() }),
      }),
    })
  )
  .min(1);

export type AccuWeatherAdapterOptions = {
  apiKey: string;
  baseUrl: string;
  http?: AxiosInstance;
  now?: () => Date;
};

export class AccuWeatherAdapter implements WeatherProvider {
  readonly name = 'accuweather';
  private readonly http: AxiosInstance;
  private readonly now: () => Date;

  constructor(private readonly options: AccuWeatherAdapterOptions) {
    this.http = options.http ?? sharedHttp;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(city: string, options: FetchOptions = {}): Promise<WeatherReading> {
    if (!city) {
      throw validationError('city cannot be empty');
    }
    if (!this.options.apiKey) {
      throw externalApiError('AccuWeather API key not configured');
    }

    const locationKey = await this.lookupLocationKey(city, options.signal);

    const { status, data } = await getUpstream(
      this.http,
      'AccuWeather',
      joinUrl(this.options.baseUrl, `/currentconditions/v1/${encodeURIComponent(locationKey)}`),
      { apikey: this.options.apiKey, details: 'true' },
      options.signal
    );

    if (!isSuccessStatus(status)) {
      throw externalApiError(`AccuWeather returned status ${status}`, undefined, status);
    }

    const parsed = CurrentConditionsSchema.safeParse(data);
    if (!parsed.success) {
      throw externalApiError('failed to decode AccuWeather response', parsed.error);
    }

    const [current] = parsed.data;
    if (!current) {
      throw externalApiError('failed to decode AccuWeather response');
    }

    return createReading({
      temperature: current.Temperature.Metric.Value,
      humidity: current.RelativeHumidity,
      description: current.WeatherText,
      city,
      timestamp: this.now(),
    });
  }

  private async lookupLocationKey(city: string, signal?: AbortSignal): Promise<string> {
    const { status, data } = await getUpstream(
      this.http,
      'AccuWeather',
      joinUrl(this.options.baseUrl, '/locations/v1/cities/search'),
      { apikey: this.options.apiKey, q: city },
      signal
    );

    if (!isSuccessStatus(status)) {
      throw externalApiError(`AccuWeather location search returned status ${status}`, undefined, status);
    }

    const parsed = CitySearchSchema.safeParse(data);
    if (!parsed.success) {
      throw externalApiError('failed to decode AccuWeather location search', parsed.error);
    }

    const first = parsed.data[0];
    if (!first) {
      throw notFoundError('city not found');
    }
    return first.Key;
  }
}
