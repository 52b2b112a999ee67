/**
 * Lambda responses: CORS headers, request id echo and AppError mapping
 * shared with the Express routes through `toErrorResult`.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { toErrorResult } from '../controllers/errors';
import type { ControllerResult } from '../controllers/types';
import { REQUEST_ID_HEADER } from '../lib/requestContext';

export type LambdaResult = APIGatewayProxyStructuredResultV2;

export function corsHeaders(requestId?: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': `Content-Type,Authorization,${REQUEST_ID_HEADER}`,
    'Access-Control-Allow-Methods': 'GET,OPTIONS',
    ...(requestId ? { [REQUEST_ID_HEADER]: requestId } : {}),
  };
}

export const isPreflight = (event: APIGatewayProxyEventV2): boolean =>
  event.requestContext.http.method.toUpperCase() === 'OPTIONS';

export const preflight = (): LambdaResult => ({ statusCode: 200, headers: corsHeaders(), body: '' });

// Client header first, then the API Gateway request id.
export function requestIdFrom(event: APIGatewayProxyEventV2): string {
  return event.headers['x-request-id'] ?? event.headers['X-Request-ID'] ?? event.requestContext.requestId;
}

export function respond(result: ControllerResult, requestId?: string): LambdaResult {
  return {
    statusCode: result.statusCode,
    headers: { ...corsHeaders(requestId), ...result.headers },
    body: JSON.stringify(result.body),
  };
}

export function respondWithError(error: unknown, requestId?: string): LambdaResult {
  const mapped = toErrorResult(error);
  if (mapped.statusCode === 500) {
    return respond(
      { statusCode: 500, body: { error: 'internal_error', message: 'Unexpected error in Lambda handler' } },
      requestId
    );
  }
  return respond(mapped, requestId);
}
