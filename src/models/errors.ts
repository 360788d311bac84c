/**
 * Application Error Models
 *
 * Common error types raised by the HTTP access layer, repositories and
 * services. The CLI error handler maps each of them to a message and an
 * exit code.
 */

/**
 * Credentials are missing or were rejected by an authenticated endpoint (401)
 */
export class AuthenticationRequiredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationRequiredError';
  }
}

/**
 * Resource not found error (404)
 */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Upstream kept rejecting requests with 429
 */
export class RateLimitedError extends Error {
  constructor(message: string, public readonly url: string) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/**
 * Any other non-200 upstream status
 */
export class UpstreamHttpError extends Error {
  constructor(public readonly status: number, public readonly url: string) {
    super(`Upstream request failed with HTTP ${status}: ${url}`);
    this.name = 'UpstreamHttpError';
  }
}

/**
 * A 200 response whose body does not have the expected shape
 */
export class UpstreamPayloadError extends Error {
  constructor(message: string, public readonly details?: string[]) {
    super(message);
    this.name = 'UpstreamPayloadError';
  }
}
