/**
 * Health controller: process liveness plus the cache backend in use.
 */

import { logger } from '../lib/logger';
import type { CacheStore } from '../types';
import type { ControllerResult } from './types';

export function healthCheckController(cacheStore: CacheStore, requestId?: string): ControllerResult {
  const healthData = {
    ok: true,
    time: new Date().toISOString(),
    uptime: process.uptime(),
    version: process.env['npm_package_version'] || '1.0.0',
    environment: process.env['NODE_ENV'] || 'development',
    cache_type: cacheStore.type,
  };

  logger.debug({ reqId: requestId, uptime: healthData.uptime }, 'Health check completed');

  return { statusCode: 200, body: healthData };
}
