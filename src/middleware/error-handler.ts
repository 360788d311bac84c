/**
 * Error Handling Middleware
 *
 * Centralized error handling that maps application errors to a message for
 * stderr and a process exit code:
 * - AuthenticationRequiredError → 2, with the setup hint
 * - NotFoundError → 3
 * - Upstream failures (HTTP, payload, rate limit) → 4
 * - anything else → 1
 */

import { AUTH_SETUP_HINT } from './session-auth';
import {
  AuthenticationRequiredError,
  NotFoundError,
  RateLimitedError,
  UpstreamHttpError,
  UpstreamPayloadError,
} from '../models/errors';
import { log, LogLevel } from '../utils/logger';

/**
 * Process exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  AUTHENTICATION_REQUIRED = 2,
  NOT_FOUND = 3,
  UPSTREAM_FAILURE = 4,
}

export interface CliErrorResult {
  exitCode: ExitCode;
  message: string;
}

/**
 * Handle error and format the user-facing outcome
 *
 * @example
 * ```typescript
 * try {
 *   // ... command
 * } catch (error) {
 *   const { exitCode, message } = handleCliError(error);
 *   console.error(message);
 *   process.exitCode = exitCode;
 * }
 * ```
 */
export function handleCliError(error: unknown): CliErrorResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AuthenticationRequiredError) {
    const message = err.message.includes(AUTH_SETUP_HINT)
      ? err.message
      : `${err.message} ${AUTH_SETUP_HINT}`;
    return { exitCode: ExitCode.AUTHENTICATION_REQUIRED, message: `Error: ${message}` };
  }

  if (err instanceof NotFoundError) {
    return { exitCode: ExitCode.NOT_FOUND, message: `Error: ${err.message}` };
  }

  if (err instanceof UpstreamPayloadError) {
    const details = err.details && err.details.length > 0
      ? `\n  ${err.details.join('\n  ')}`
      : '';
    return { exitCode: ExitCode.UPSTREAM_FAILURE, message: `Error: ${err.message}${details}` };
  }

  if (err instanceof UpstreamHttpError || err instanceof RateLimitedError) {
    return { exitCode: ExitCode.UPSTREAM_FAILURE, message: `Error: ${err.message}` };
  }

  log(LogLevel.ERROR, 'Unhandled error', { error: err.message, name: err.name });
  return { exitCode: ExitCode.FAILURE, message: `Error: ${err.message}` };
}
