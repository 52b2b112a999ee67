import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import type { WeatherService } from '../services/weather.service';
import { toErrorResult } from './errors';
import type { ControllerResult } from './types';

export function getMetricsController(service: WeatherService, requestId?: string): ControllerResult {
  try {
    const providerInfo = service.getProviderInfo();
    const stats = service.getCacheMetrics();

    logger.debug({ reqId: requestId, hits: stats.hits, misses: stats.misses }, 'Metrics requested');

    return {
      statusCode: 200,
      body: {
        provider_info: providerInfo,
        cache: {
          hits: stats.hits,
          misses: stats.misses,
          total_ops: stats.totalOps,
          hit_ratio: stats.hitRatio,
          last_updated: stats.lastUpdated.toISOString(),
        },
      },
    };
  } catch (error) {
    logger.error({ reqId: requestId, error: errorMessage(error) }, 'Error getting metrics');
    return toErrorResult(error);
  }
}
