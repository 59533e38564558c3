/**
 * Error taxonomy for the Last.fm client and the local caches.
 *
 * Upstream errors (network, API, malformed response) propagate out of the
 * scrobble history fetch. Cache I/O errors are logged where they occur and
 * never reach a caller.
 */

interface ErrorOptionsWithCause {
  cause?: unknown;
}

/** Transport failure reaching Last.fm (DNS, refused connection, timeout, HTTP failure). */
export class NetworkError extends Error {
  constructor(message: string, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** Last.fm answered with a top-level `error` field. */
export class ApiError extends Error {
  readonly code: number | undefined;

  constructor(message: string, code?: number, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'ApiError';
    this.code = code;
  }
}

/** Last.fm answered, but not with the shape we expect. */
export class MalformedResponseError extends Error {
  constructor(message: string, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/** Reading or writing a local cache file failed. */
export class CacheIOError extends Error {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorOptionsWithCause) {
    super(message, options);
    this.name = 'CacheIOError';
    this.filePath = filePath;
  }
}

export type UpstreamError = NetworkError | ApiError | MalformedResponseError;

export function isUpstreamError(error: unknown): error is UpstreamError {
  return (
    error instanceof NetworkError ||
    error instanceof ApiError ||
    error instanceof MalformedResponseError
  );
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
