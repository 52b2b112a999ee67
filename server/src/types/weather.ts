/**
 * A single point-in-time observation. Readings are frozen once created.
 */
export type WeatherReading = Readonly<{
  temperature: number; // °C
  humidity: number; // percent, 0..100
  description: string;
  city: string;
  timestamp: Date;
}>;

export type CacheStats = {
  hits: number;
  misses: number;
  totalOps: number;
  hitRatio: number;
  lastUpdated: Date;
};

export type FetchOptions = {
  signal?: AbortSignal;
};

export interface WeatherProvider {
  readonly name: string;
  fetch(city: string, options?: FetchOptions): Promise<WeatherReading>;
}

export type ChainInfo = {
  total_providers: number;
  provider_order: string[];
  chain_enabled: boolean;
  fallback_enabled: boolean;
  logging_enabled?: boolean;
};

export interface WeatherResolver {
  resolve(city: string, options?: FetchOptions): Promise<WeatherReading>;
  getProviderInfo(): ChainInfo;
}

export type ProviderInfo = {
  provider_order: string[];
  total_providers: number;
  fallback_enabled: boolean;
  chain_enabled: boolean;
  cache_enabled: boolean;
  logging_enabled: boolean;
};
