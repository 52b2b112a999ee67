/**
 * Reading construction, validation and conversions.
 */

import { z } from 'zod';
import type { WeatherReading } from '../types';

export const ABSOLUTE_ZERO_C = -273.15;

export function createReading(fields: {
  temperature: number;
  humidity: number;
  description: string;
  city: string;
  timestamp?: Date;
}): WeatherReading {
  return Object.freeze({
    temperature: fields.temperature,
    humidity: fields.humidity,
    description: fields.description,
    city: fields.city,
    timestamp: fields.timestamp ?? new Date(),
  });
}

/**
 * Returns the first violated rule, or `undefined` for a valid reading.
 * Out-of-range values are reported, never clamped.
 */
export function validateReading(reading: WeatherReading): string | undefined {
  if (!reading.city || reading.city.trim() === '') return 'city cannot be empty';
  if (!reading.description || reading.description.trim() === '') return 'description cannot be empty';
  if (!Number.isFinite(reading.temperature)) return 'temperature must be a finite number';
  if (reading.temperature < ABSOLUTE_ZERO_C) return 'temperature cannot be below absolute zero';
  if (!Number.isFinite(reading.humidity) || reading.humidity < 0 || reading.humidity > 100) {
    return 'humidity must be between 0 and 100';
  }
  return undefined;
}

export const isValidReading = (reading: WeatherReading): boolean => validateReading(reading) === undefined;

export const normalizeCity = (city: string): string => city.trim();

export function validateCity(city: string | undefined | null): string | undefined {
  if (typeof city !== 'string' || city.trim() === '') return 'city cannot be empty';
  return undefined;
}

export const toFahrenheit = (reading: WeatherReading): number => (reading.temperature * 9) / 5 + 32;

export const toKelvin = (reading: WeatherReading): number => reading.temperature - ABSOLUTE_ZERO_C;

export function describeHumidity(reading: WeatherReading): string {
  const h = reading.humidity;
  if (h < 20) return 'Very dry';
  if (h < 30) return 'Dry';
  if (h < 60) return 'Comfortable';
  if (h < 80) return 'Humid';
  return 'Very humid';
}

// 18..28 °C and 30..70 % humidity, bounds inclusive
export function isComfortable(reading: WeatherReading): boolean {
  return (
    reading.temperature >= 18 &&
    reading.temperature <= 28 &&
    reading.humidity >= 30 &&
    reading.humidity <= 70
  );
}

export function formatReading(reading: WeatherReading): string {
  return `${reading.city}: ${reading.temperature.toFixed(1)}°C, ${reading.humidity.toFixed(1)}% humidity, ${reading.description}`;
}

const CachedReadingSchema = z.object({
  temperature: z.number(),
  humidity: z.number(),
  description: z.string(),
  city: z.string(),
  timestamp: z.string().datetime({ offset: true }),
});

export type CachedReading = z.infer<typeof CachedReadingSchema>;

export function serializeReading(reading: WeatherReading): string {
  const record: CachedReading = {
    temperature: reading.temperature,
    humidity: reading.humidity,
    description: reading.description,
    city: reading.city,
    timestamp: reading.timestamp.toISOString(),
  };
  return JSON.stringify(record);
}

/**
 * Parses a cached payload. Throws on malformed JSON or a record that does
 * not match the cached shape.
 */
export function deserializeReading(raw: string): WeatherReading {
  const parsed = CachedReadingSchema.parse(JSON.parse(raw));
  return createReading({ ...parsed, timestamp: new Date(parsed.timestamp) });
}
