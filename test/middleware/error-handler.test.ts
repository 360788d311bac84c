/**
 * Error Handler Middleware Tests
 *
 * Tests for mapping application errors to CLI messages and exit codes
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ExitCode, handleCliError } from '../../src/middleware/error-handler';
import {
  AuthenticationRequiredError,
  NotFoundError,
  RateLimitedError,
  UpstreamHttpError,
  UpstreamPayloadError,
} from '../../src/models/errors';

describe('handleCliError', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should add the setup hint to authentication errors', () => {
    expect(handleCliError(new AuthenticationRequiredError('Session expired.'))).toEqual({
      exitCode: ExitCode.AUTHENTICATION_REQUIRED,
      message: "Error: Session expired. Run 'clubscan auth setup' to configure credentials.",
    });
  });

  it('should not repeat a hint already present', () => {
    const error = new AuthenticationRequiredError(
      "Session credentials not found. Run 'clubscan auth setup' to configure credentials."
    );
    expect(handleCliError(error).message).toBe(
      "Error: Session credentials not found. Run 'clubscan auth setup' to configure credentials."
    );
  });

  it('should map not found errors to exit code 3', () => {
    expect(handleCliError(new NotFoundError('Club "nope" not found'))).toEqual({
      exitCode: 3,
      message: 'Error: Club "nope" not found',
    });
  });

  it('should map upstream failures to exit code 4', () => {
    expect(handleCliError(new UpstreamHttpError(502, 'https://api.chess.com/pub/club/x')).exitCode).toBe(
      ExitCode.UPSTREAM_FAILURE
    );
    expect(
      handleCliError(new RateLimitedError('Rate limited', 'https://api.chess.com/pub/club/x')).exitCode
    ).toBe(4);
  });

  it('should list payload validation details', () => {
    const error = new UpstreamPayloadError('Unexpected club payload', ['/name: expected string']);
    expect(handleCliError(error)).toEqual({
      exitCode: 4,
      message: 'Error: Unexpected club payload\n  /name: expected string',
    });
  });

  it('should map anything else to exit code 1', () => {
    expect(handleCliError(new Error('boom'))).toEqual({ exitCode: 1, message: 'Error: boom' });
    expect(handleCliError('plain string')).toEqual({ exitCode: 1, message: 'Error: plain string' });
  });
});
