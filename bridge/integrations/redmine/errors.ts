/**
 * Redmine error taxonomy.
 *
 * Every failure of a remote call surfaces as one of these, whatever the
 * underlying HTTP status or transport fault was.
 */

export class RedmineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RedmineError';
  }
}

/** The API key was rejected (HTTP 401). */
export class RedmineAuthError extends RedmineError {
  constructor(message = 'Invalid API key', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RedmineAuthError';
  }
}

/** Network, TLS, timeout, or a non-auth failure on a read call. */
export class RedmineConnectionError extends RedmineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RedmineConnectionError';
  }
}

/** A non-2xx answer to a mutating call. */
export class RedmineApiError extends RedmineError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RedmineApiError';
    this.status = status;
  }
}

/** HTTP 422: the server rejected the issue; `errors` lists every reason. */
export class RedmineValidationError extends RedmineApiError {
  readonly errors: string[];

  constructor(errors: string[], options?: { cause?: unknown }) {
    const reasons = errors.length > 0 ? errors : ['Unknown validation error'];
    super(`Validation error: ${reasons.join(', ')}`, 422, options);
    this.name = 'RedmineValidationError';
    this.errors = reasons;
  }
}

/**
 * Describe a transport-level failure for humans.
 *
 * undici wraps socket errors in a `TypeError('fetch failed')` whose cause
 * holds the useful part (ECONNREFUSED, ENOTFOUND, certificate errors).
 */
export function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);

  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return 'request timed out';
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? `${cause.code}: ` : '';
    return `${code}${cause.message}`;
  }

  return error.message;
}
