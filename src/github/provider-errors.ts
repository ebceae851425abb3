import { RequestError } from '@octokit/request-error';
import {
  AuthError,
  errorMessage,
  isBackupError,
  NetworkError,
  SourceUnavailableError,
} from '../common/errors.js';

type HeaderBag = Record<string, string | number | undefined>;

function statusOf(error: unknown): number | undefined {
  if (error instanceof RequestError) return error.status;
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function headersOf(error: unknown): HeaderBag {
  if (error instanceof RequestError && error.response) {
    return error.response.headers;
  }
  return {};
}

function header(headers: HeaderBag, name: string): string | undefined {
  const value = headers[name];
  return value === undefined ? undefined : String(value);
}

/** Milliseconds until the provider will accept requests again, when it says. */
export function rateLimitDelayMs(headers: HeaderBag, now = Date.now()): number | null {
  const retryAfter = Number(header(headers, 'retry-after'));
  if (Number.isFinite(retryAfter) && retryAfter > 0) {
    return retryAfter * 1000;
  }
  if (header(headers, 'x-ratelimit-remaining') === '0') {
    const reset = Number(header(headers, 'x-ratelimit-reset'));
    if (Number.isFinite(reset)) return Math.max(0, reset * 1000 - now);
  }
  return null;
}

function isRateLimited(headers: HeaderBag, message: string): boolean {
  return (
    header(headers, 'x-ratelimit-remaining') === '0' ||
    header(headers, 'retry-after') !== undefined ||
    /rate limit/i.test(message)
  );
}

/**
 * Translate an Octokit failure into the backup error taxonomy so callers
 * never see provider status codes. Errors that did not come from an HTTP
 * exchange are returned untouched.
 */
export function mapProviderError(error: unknown, operation: string, now = Date.now()): Error {
  if (isBackupError(error)) return error;

  const status = statusOf(error);
  if (status === undefined) {
    return error instanceof Error ? error : new Error(errorMessage(error));
  }

  const message = `${operation} failed (${status}): ${errorMessage(error)}`;
  const headers = headersOf(error);

  if (status === 401) {
    return new AuthError(message, { cause: error });
  }
  if (status === 429 || (status === 403 && isRateLimited(headers, errorMessage(error)))) {
    return new NetworkError(message, {
      cause: error,
      retryAfterMs: rateLimitDelayMs(headers, now),
    });
  }
  if (status === 403) {
    return new AuthError(message, { cause: error });
  }
  if (status >= 500) {
    return new NetworkError(message, { cause: error });
  }
  // 404, 410, 422 and any other client error: the resource cannot be served
  return new SourceUnavailableError(message, { cause: error });
}
