// server/src/lib/env.ts
import { configurationError } from './errors';

export const PROVIDER_NAMES = ['weatherapi', 'openweathermap', 'accuweather'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type CacheType = 'memory' | 'redis';

export type RedisConfig = {
  host: string;
  port: number;
  password: string;
  db: number;
  dialTimeoutSec: number;
  readTimeoutSec: number;
  writeTimeoutSec: number;
};

export type CacheConfig = {
  type: CacheType | 'unknown';
  redis: RedisConfig;
};

export type WeatherConfig = {
  weatherApiKey: string;
  weatherApiBaseUrl: string;
  openWeatherMapKey: string;
  openWeatherMapBaseUrl: string;
  accuWeatherKey: string;
  accuWeatherBaseUrl: string;
  providerOrder: string[];
  enableCache: boolean;
  enableLogging: boolean;
  cacheTtlMinutes: number;
  logFilePath: string;
  requestTimeoutMs: number;
};

export type ServerConfig = {
  port: number;
  corsOrigins: string[];
  rateLimitWindowMs: number;
  rateLimitMax: number;
};

export type AppConfig = {
  server: ServerConfig;
  weather: WeatherConfig;
  cache: CacheConfig;
};

type EnvSource = Record<string, string | undefined>;

const MAX_CACHE_TTL_MINUTES = 1440;
const MAX_REDIS_DB = 15;
const MAX_PORT = 65535;

function pick(...candidates: Array<string | undefined | null>): string {
  for (const c of candidates) if (c && c.trim().length > 0) return c.trim();
  return '';
}

function pickNumber(value: string | undefined | null, fallback: number): number {
  if (value == null) return fallback;
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function pickBool(value: string | undefined | null, fallback: boolean): boolean {
  const trimmed = (value || '').trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(trimmed)) return true;
  if (['0', 'false', 'no', 'off'].includes(trimmed)) return false;
  return fallback;
}

function pickList(value: string | undefined | null, fallback: string[]): string[] {
  const items = (value || '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function pickCacheType(value: string | undefined | null): CacheConfig['type'] {
  const trimmed = (value || '').trim().toLowerCase();
  if (!trimmed || trimmed === 'memory') return 'memory';
  if (trimmed === 'redis') return 'redis';
  return 'unknown';
}

function splitAddr(addr: string): { host: string; port: number } {
  const idx = addr.lastIndexOf(':');
  if (idx <= 0) return { host: addr, port: 6379 };
  return { host: addr.slice(0, idx), port: pickNumber(addr.slice(idx + 1), 6379) };
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const redisAddr = pick(env['REDIS_ADDR'], 'localhost:6379');
  const { host, port } = splitAddr(redisAddr);

  return {
    server: {
      port: pickNumber(env['PORT'], 8787),
      corsOrigins: pickList(env['CORS_ORIGINS'], ['http://localhost:3000']),
      rateLimitWindowMs: pickNumber(env['RATE_LIMIT_WINDOW_MS'], 60_000),
      rateLimitMax: pickNumber(env['RATE_LIMIT_MAX'], 120),
    },
    weather: {
      weatherApiKey: pick(env['WEATHER_API_KEY']),
      weatherApiBaseUrl: pick(env['WEATHER_API_BASE_URL'], 'https://api.weatherapi.com/v1'),
      openWeatherMapKey: pick(env['OPENWEATHERMAP_API_KEY']),
      openWeatherMapBaseUrl: pick(env['OPENWEATHERMAP_API_BASE_URL'], 'https://api.openweathermap.org/data/2.5'),
      accuWeatherKey: pick(env['ACCUWEATHER_API_KEY']),
      accuWeatherBaseUrl: pick(env['ACCUWEATHER_API_BASE_URL'], 'https://dataservice.accuweather.com'),
      providerOrder: pickList(env['WEATHER_PROVIDER_ORDER'], [...PROVIDER_NAMES]),
      enableCache: pickBool(env['WEATHER_ENABLE_CACHE'], true),
      enableLogging: pickBool(env['WEATHER_ENABLE_LOGGING'], true),
      cacheTtlMinutes: pickNumber(env['WEATHER_CACHE_TTL_MINUTES'], 10),
      logFilePath: pick(env['WEATHER_LOG_FILE_PATH']),
      requestTimeoutMs: pickNumber(env['REQUEST_TIMEOUT_MS'], 7000),
    },
    cache: {
      type: pickCacheType(env['CACHE_TYPE']),
      redis: {
        host,
        port,
        password: pick(env['REDIS_PASSWORD']),
        db: pickNumber(env['REDIS_DB'], 0),
        dialTimeoutSec: pickNumber(env['REDIS_DIAL_TIMEOUT'], 5),
        readTimeoutSec: pickNumber(env['REDIS_READ_TIMEOUT'], 3),
        writeTimeoutSec: pickNumber(env['REDIS_WRITE_TIMEOUT'], 3),
      },
    },
  };
}

export function isProviderName(value: string): value is ProviderName {
  return (PROVIDER_NAMES as readonly string[]).includes(value);
}

const isHttpUrl = (value: string) => value.startsWith('http://') || value.startsWith('https://');

function validateWeather(w: WeatherConfig): void {
  if (!w.weatherApiKey && !w.openWeatherMapKey && !w.accuWeatherKey) {
    throw configurationError('at least one weather provider API key must be configured');
  }

  const urls: Array<[string, string, string]> = [
    [w.weatherApiKey, w.weatherApiBaseUrl, 'WEATHER_API_BASE_URL'],
    [w.openWeatherMapKey, w.openWeatherMapBaseUrl, 'OPENWEATHERMAP_API_BASE_URL'],
    [w.accuWeatherKey, w.accuWeatherBaseUrl, 'ACCUWEATHER_API_BASE_URL'],
  ];
  for (const [key, url, name] of urls) {
    if (key && !isHttpUrl(url)) {
      throw configurationError(`${name} must start with http:// or https://`);
    }
  }

  if (w.cacheTtlMinutes < 1 || w.cacheTtlMinutes > MAX_CACHE_TTL_MINUTES) {
    throw configurationError('WEATHER_CACHE_TTL_MINUTES must be between 1 and 1440 minutes');
  }

  for (const name of w.providerOrder) {
    if (!isProviderName(name)) {
      throw configurationError(`invalid weather provider in order: ${name}`);
    }
  }
}

function validateCache(c: CacheConfig): void {
  if (c.type === 'unknown') {
    throw configurationError('CACHE_TYPE must be one of: memory, redis');
  }
  if (c.type !== 'redis') return;

  const r = c.redis;
  if (!r.host) {
    throw configurationError('REDIS_ADDR cannot be empty when using Redis cache');
  }
  if (r.db < 0 || r.db > MAX_REDIS_DB) {
    throw configurationError('REDIS_DB must be between 0 and 15');
  }
  if (r.dialTimeoutSec < 1) throw configurationError('REDIS_DIAL_TIMEOUT must be at least 1 second');
  if (r.readTimeoutSec < 1) throw configurationError('REDIS_READ_TIMEOUT must be at least 1 second');
  if (r.writeTimeoutSec < 1) throw configurationError('REDIS_WRITE_TIMEOUT must be at least 1 second');
}

export function validateConfig(config: AppConfig): AppConfig {
  if (config.server.port < 1 || config.server.port > MAX_PORT) {
    throw configurationError('PORT must be between 1 and 65535');
  }
  validateWeather(config.weather);
  validateCache(config.cache);
  return config;
}

export const cacheTtlMs = (weather: WeatherConfig): number => weather.cacheTtlMinutes * 60_000;
