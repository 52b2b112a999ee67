/**
 * Controller response shared by the Express routes and the Lambda handlers.
 */

export type ControllerResult<T = unknown> = {
  statusCode: number;
  body: T;
  headers?: Record<string, string>;
};

export type ErrorBody = {
  error: string;
  message: string;
};
