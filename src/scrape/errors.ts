/**
 * Scrape Error
 *
 * Every failure of a relayed fetch, tagged with the HTTP status the relay answers with.
 */

export type ScrapeErrorType =
  | 'invalid_request'
  | 'invalid_proxy'
  | 'client_init'
  | 'request'
  | 'upstream_status'
  | 'body_read';

export interface ScrapeErrorDetails {
  type: ScrapeErrorType;
  status: number;
  cause?: unknown;
}

/**
 * Render an error for a client-facing message.
 * Network errors from fetch carry the useful part ("connect ECONNREFUSED ...") in their cause.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message || error.name;
}

export class ScrapeError extends Error {
  public readonly type: ScrapeErrorType;
  public readonly status: number;

  constructor(message: string, details: ScrapeErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'ScrapeError';
    this.type = details.type;
    this.status = details.status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScrapeError);
    }
  }

  /**
   * Malformed or incomplete request body
   */
  static invalidRequest(reason: string): ScrapeError {
    return new ScrapeError(`Invalid request body: ${reason}`, {
      type: 'invalid_request',
      status: 400,
    });
  }

  /**
   * Proxy string that is not a usable proxy URI
   */
  static invalidProxy(proxy: string, cause?: unknown): ScrapeError {
    return new ScrapeError(`Invalid proxy URL: ${proxy}`, {
      type: 'invalid_proxy',
      status: 400,
      cause,
    });
  }

  static clientInit(cause: unknown): ScrapeError {
    return new ScrapeError(`Failed to initialize HTTP client: ${describeError(cause)}`, {
      type: 'client_init',
      status: 500,
      cause,
    });
  }

  /**
   * Transport failure: DNS, connect, TLS, proxy handshake or timeout
   */
  static request(cause: unknown): ScrapeError {
    return new ScrapeError(`Failed to make HTTP request: ${describeError(cause)}`, {
      type: 'request',
      status: 500,
      cause,
    });
  }

  /**
   * Upstream answered with a non-2xx status, which is passed through
   */
  static upstreamStatus(status: number, reason: string): ScrapeError {
    return new ScrapeError(`HTTP request failed with status: ${status} ${reason}`, {
      type: 'upstream_status',
      status,
    });
  }

  static bodyRead(cause: unknown): ScrapeError {
    return new ScrapeError(`Failed to read response body: ${describeError(cause)}`, {
      type: 'body_read',
      status: 500,
      cause,
    });
  }
}
