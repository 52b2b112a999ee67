import { isAppError } from '../lib/errors';
import type { ControllerResult, ErrorBody } from './types';

/**
 * Maps an error to the client-facing status and body. Upstream and
 * configuration failures are reported generically.
 */
export function toErrorResult(error: unknown): ControllerResult<ErrorBody> {
  if (!isAppError(error)) {
    return { statusCode: 500, body: { error: 'internal_error', message: 'Internal server error' } };
  }

  switch (error.kind) {
    case 'validation':
      return { statusCode: 400, body: { error: 'validation_error', message: error.message } };
    case 'not_found':
      return { statusCode: 404, body: { error: 'not_found', message: error.message } };
    case 'external_api':
      return {
        statusCode: 503,
        body: { error: 'external_api_error', message: 'External service unavailable' },
      };
    case 'configuration':
      return { statusCode: 503, body: { error: 'configuration_error', message: 'Service misconfigured' } };
  }
}
