export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'AppError';
    this.status = status;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class ConfigMissingError extends AppError {
  constructor(message = 'AI settings are incomplete, configure api_url, api_key and model first') {
    super(message, 400);
    this.name = 'ConfigMissingError';
  }
}

export class UpstreamError extends AppError {
  readonly upstreamStatus: number;
  readonly body: string;

  constructor(message: string, upstreamStatus: number, body: string) {
    super(message, 500);
    this.name = 'UpstreamError';
    this.upstreamStatus = upstreamStatus;
    this.body = body;
  }
}

export class NetworkError extends AppError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false) {
    super(message, 500);
    this.name = 'NetworkError';
    this.timedOut = timedOut;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500);
    this.name = 'PersistenceError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export const getErrorMessage = (error: unknown, fallback = 'Something went wrong'): string => {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }
  return fallback;
};

export const getErrorStatus = (error: unknown): number =>
  error instanceof AppError ? error.status : 500;

const isTimeoutError = (error: unknown) =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * Converts a rejected `fetch` into a `NetworkError`.
 *
 * `AbortSignal.timeout()` rejects with a `TimeoutError`; undici reports connection
 * problems as a `TypeError` whose `cause` carries the system error.
 */
export const toNetworkError = (error: unknown, timeoutMessage: string): NetworkError => {
  if (error instanceof NetworkError) return error;
  if (isTimeoutError(error)) return new NetworkError(timeoutMessage, true);

  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : '';
  const detail = cause || getErrorMessage(error, 'request failed');
  return new NetworkError(`Network error: ${detail}`);
};
