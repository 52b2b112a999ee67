/**
 * Lambda entry point: GET /api/weather?city=<name>
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2 } from 'aws-lambda';
import { getWeatherController } from '../controllers/weather.controller';
import { logger } from '../lib/logger';
import { getDependencies } from './deps';
import { isPreflight, preflight, requestIdFrom, respond, respondWithError } from './http';

export async function handler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyResultV2> {
  if (isPreflight(event)) return preflight();

  const requestId = requestIdFrom(event);
  try {
    const { weatherService } = await getDependencies();
    const result = await getWeatherController(weatherService, {
      city: event.queryStringParameters?.['city'],
      requestId,
    });
    return respond(result, requestId);
  } catch (error) {
    logger.error({ err: error, reqId: requestId }, 'Error in weather Lambda');
    return respondWithError(error, requestId);
  }
}
