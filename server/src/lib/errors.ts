export type ErrorKind = 'validation' | 'not_found' | 'external_api' | 'configuration';

export class AppError extends Error {
  kind: ErrorKind;
  status?: number;
  constructor(msg: string, kind: ErrorKind, cause?: unknown, status?: number) {
    super(msg, cause !== undefined ? { cause } : undefined);
    this.name = 'AppError';
    this.kind = kind;
    if (status !== undefined) {
      this.status = status;
    }
  }
}

export const validationError = (msg: string): AppError => new AppError(msg, 'validation');

export const notFoundError = (msg: string): AppError => new AppError(msg, 'not_found');

export const externalApiError = (msg: string, cause?: unknown, status?: number): AppError =>
  new AppError(msg, 'external_api', cause, status);

export const configurationError = (msg: string, cause?: unknown): AppError =>
  new AppError(msg, 'configuration', cause);

export function isAppError(error: unknown, kind?: ErrorKind): error is AppError {
  if (!(error instanceof AppError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Walks `error` and its `cause` chain and returns the first AppError of the given kind.
 */
export function findErrorOfKind(error: unknown, kind: ErrorKind): AppError | undefined {
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (isAppError(current, kind)) return current;
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

// Message plus every nested cause, for logs.
export function describeError(error: unknown): string {
  const parts: string[] = [errorMessage(error)];
  let current: unknown = error instanceof Error ? error.cause : undefined;
  while (current !== undefined && parts.length < 8) {
    parts.push(errorMessage(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(': ');
}
