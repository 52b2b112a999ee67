/**
 * Lambda entry point for GET /api/healthz and GET /api/metrics; the route is
 * taken from the route key, or the raw path when there is none.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { healthCheckController } from '../controllers/health.controller';
import { getMetricsController } from '../controllers/metrics.controller';
import { logger } from '../lib/logger';
import { getDependencies } from './deps';
import { isPreflight, preflight, requestIdFrom, respond, respondWithError } from './http';

type Route = 'health' | 'metrics';

function routeOf(event: APIGatewayProxyEventV2): Route | undefined {
  const target = (event.routeKey && event.routeKey !== '$default' ? event.routeKey : event.rawPath).toLowerCase();
  if (target.endsWith('/metrics')) return 'metrics';
  if (target.endsWith('/healthz') || target.endsWith('/health')) return 'health';
  return undefined;
}

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isPreflight(event)) return preflight();

  const requestId = requestIdFrom(event);
  const route = routeOf(event);
  if (!route) {
    return respond({ statusCode: 404, body: { error: 'not_found', message: 'Unsupported route' } }, requestId);
  }

  try {
    const { weatherService, cacheStore } = await getDependencies();
    const result =
      route === 'metrics'
        ? getMetricsController(weatherService, requestId)
        : healthCheckController(cacheStore, requestId);
    return respond(result, requestId);
  } catch (error) {
    logger.error({ err: error, route, reqId: requestId }, 'Error in health Lambda');
    return respondWithError(error, requestId);
  }
}
