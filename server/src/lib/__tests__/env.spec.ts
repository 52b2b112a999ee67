import { cacheTtlMs, loadConfig, validateConfig } from '../env';
import { isAppError } from '../errors';

const withKey = { WEATHER_API_KEY: 'test-key' };

describe('env config', () => {
  describe('loadConfig', () => {
    it('applies defaults', () => {
      const config = loadConfig({});

      expect(config.server).toEqual({
        port: 8787,
        corsOrigins: ['http://localhost:3000'],
        rateLimitWindowMs: 60_000,
        rateLimitMax: 120,
      });
      expect(config.weather.providerOrder).toEqual(['weatherapi', 'openweathermap', 'accuweather']);
      expect(config.weather.enableCache).toBe(true);
      expect(config.weather.enableLogging).toBe(true);
      expect(config.weather.cacheTtlMinutes).toBe(10);
      expect(config.weather.requestTimeoutMs).toBe(7000);
      expect(config.cache.type).toBe('memory');
      expect(config.cache.redis).toMatchObject({ host: 'localhost', port: 6379, db: 0 });
    });

    it('reads provider settings and flags', () => {
      const config = loadConfig({
        OPENWEATHERMAP_API_KEY: ' test-owm ',
        WEATHER_PROVIDER_ORDER: 'openweathermap, weatherapi',
        WEATHER_ENABLE_CACHE: 'false',
        WEATHER_ENABLE_LOGGING: 'no',
        WEATHER_CACHE_TTL_MINUTES: '30',
        CORS_ORIGINS: 'https://a.example,https://b.example',
      });

      expect(config.weather.openWeatherMapKey).toBe('test-owm');
      expect(config.weather.providerOrder).toEqual(['openweathermap', 'weatherapi']);
      expect(config.weather.enableCache).toBe(false);
      expect(config.weather.enableLogging).toBe(false);
      expect(cacheTtlMs(config.weather)).toBe(1_800_000);
      expect(config.server.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    });

    it('keeps the default for unparseable numbers and flags', () => {
      const config = loadConfig({ PORT: 'abc', WEATHER_ENABLE_CACHE: 'maybe' });
      expect(config.server.port).toBe(8787);
      expect(config.weather.enableCache).toBe(true);
    });

    it('splits REDIS_ADDR into host and port', () => {
      const config = loadConfig({ CACHE_TYPE: 'Redis', REDIS_ADDR: 'cache.internal:6380', REDIS_DB: '2' });
      expect(config.cache.type).toBe('redis');
      expect(config.cache.redis).toMatchObject({ host: 'cache.internal', port: 6380, db: 2 });
    });
  });

  describe('validateConfig', () => {
    const expectConfigError = (env: Record<string, string>, message: string) => {
      let caught: unknown;
      try {
        validateConfig(loadConfig(env));
      } catch (error) {
        caught = error;
      }
      expect(isAppError(caught, 'configuration')).toBe(true);
      expect(caught).toHaveProperty('message', message);
    };

    it('accepts a config with one provider key', () => {
      expect(() => validateConfig(loadConfig(withKey))).not.toThrow();
    });

    it('requires at least one provider key', () => {
      expectConfigError({}, 'at least one weather provider API key must be configured');
    });

    it('requires http(s) base URLs for keyed providers', () => {
      expectConfigError(
        { ...withKey, WEATHER_API_BASE_URL: 'ftp://weather' },
        'WEATHER_API_BASE_URL must start with http:// or https://'
      );
    });

    it('ignores base URLs of providers without a key', () => {
      expect(() =>
        validateConfig(loadConfig({ ...withKey, ACCUWEATHER_API_BASE_URL: 'not-a-url' }))
      ).not.toThrow();
    });

    it('bounds the cache TTL', () => {
      expectConfigError(
        { ...withKey, WEATHER_CACHE_TTL_MINUTES: '0' },
        'WEATHER_CACHE_TTL_MINUTES must be between 1 and 1440 minutes'
      );
      expectConfigError(
        { ...withKey, WEATHER_CACHE_TTL_MINUTES: '1441' },
        'WEATHER_CACHE_TTL_MINUTES must be between 1 and 1440 minutes'
      );
    });

    it('rejects unknown provider names in the order', () => {
      expectConfigError(
        { ...withKey, WEATHER_PROVIDER_ORDER: 'weatherapi,darksky' },
        'invalid weather provider in order: darksky'
      );
    });

    it('rejects unknown cache types', () => {
      expectConfigError({ ...withKey, CACHE_TYPE: 'disk' }, 'CACHE_TYPE must be one of: memory, redis');
    });

    it('validates Redis settings only for the Redis cache', () => {
      expect(() => validateConfig(loadConfig({ ...withKey, REDIS_DB: '99' }))).not.toThrow();
      expectConfigError({ ...withKey, CACHE_TYPE: 'redis', REDIS_DB: '16' }, 'REDIS_DB must be between 0 and 15');
      expectConfigError(
        { ...withKey, CACHE_TYPE: 'redis', REDIS_DIAL_TIMEOUT: '0' },
        'REDIS_DIAL_TIMEOUT must be at least 1 second'
      );
    });

    it('bounds the port', () => {
      expectConfigError({ ...withKey, PORT: '70000' }, 'PORT must be between 1 and 65535');
    });
  });
});
