/**
 * Weather controller: current conditions for a city.
 */

import { z } from 'zod';
import { logger } from '../lib/logger';
import { errorMessage, isAppError } from '../lib/errors';
import type { WeatherService } from '../services/weather.service';
import { toErrorResult } from './errors';
import type { ControllerResult } from './types';

const WeatherQuerySchema = z.object({
  city: z.string().trim().min(1, 'city parameter is required'),
});

export type WeatherResponse = {
  temperature: number;
  humidity: number;
  description: string;
  city: string;
};

export async function getWeatherController(
  service: WeatherService,
  query: { city?: string | undefined; requestId?: string | undefined },
  signal?: AbortSignal
): Promise<ControllerResult> {
  const reqId = query.requestId;

  const parseResult = WeatherQuerySchema.safeParse({ city: query.city ?? '' });
  if (!parseResult.success) {
    logger.warn({ reqId, errors: parseResult.error.errors }, 'Invalid request parameters');
    return {
      statusCode: 400,
      body: { error: 'validation_error', message: 'city parameter is required' },
    };
  }

  const { city } = parseResult.data;

  try {
    logger.debug({ reqId, city }, 'Weather request received');
    const reading = await service.getWeather(city, signal ? { signal } : {});

    const body: WeatherResponse = {
      temperature: reading.temperature,
      humidity: reading.humidity,
      description: reading.description,
      city: reading.city,
    };

    logger.info({ reqId, city, temperature: reading.temperature }, 'Weather data retrieved successfully');
    return { statusCode: 200, body };
  } catch (error) {
    const level = isAppError(error, 'validation') || isAppError(error, 'not_found') ? 'warn' : 'error';
    logger[level]({ reqId, city, error: errorMessage(error) }, 'Weather request failed');
    return toErrorResult(error);
  }
}
