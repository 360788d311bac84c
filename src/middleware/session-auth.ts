/**
 * Session Auth Middleware
 *
 * Resolves session cookies for the internal web API and attaches them to
 * outgoing axios requests for the web host. Public API requests never carry
 * the cookies.
 */

import { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { loadStoredCredentials } from '../config/credentials';
import {
  AuthCredentials,
  AuthProvider,
  CredentialSource,
  ResolvedCredentials,
} from '../models/auth';
import { AuthenticationRequiredError } from '../models/errors';
import { log, LogLevel } from '../utils/logger';

const COOKIE_ACCESS_TOKEN = 'ACCESS_TOKEN';
const COOKIE_PHPSESSID = 'PHPSESSID';

export const AUTH_SETUP_HINT = "Run 'clubscan auth setup' to configure credentials.";

export interface CookieAuthOptions {
  accessToken?: string;
  phpsessid?: string;
  environment?: { accessToken: string; phpsessid: string };
  configDir: string;
}

interface ResolvedCookies {
  token: string;
  sessid: string;
  source: CredentialSource;
}

/**
 * Cookie-based auth provider
 *
 * Resolution order, first complete pair wins:
 * 1. Constructor values
 * 2. CHESSCOM_ACCESS_TOKEN / CHESSCOM_PHPSESSID (via config)
 * 3. {configDir}/credentials.json
 */
export class CookieAuthProvider implements AuthProvider {
  constructor(private readonly options: CookieAuthOptions) {}

  resolveCredentials(): ResolvedCredentials | null {
    const resolved = this.resolve();
    if (!resolved) {
      return null;
    }
    return {
      credentials: {
        headers: {},
        cookies: {
          [COOKIE_ACCESS_TOKEN]: resolved.token,
          [COOKIE_PHPSESSID]: resolved.sessid,
        },
      },
      source: resolved.source,
    };
  }

  getCredentials(): AuthCredentials {
    const resolved = this.resolveCredentials();
    if (!resolved) {
      throw new AuthenticationRequiredError(
        `Session credentials not found. ${AUTH_SETUP_HINT}`
      );
    }
    return resolved.credentials;
  }

  isAuthenticated(): boolean {
    return this.resolve() !== null;
  }

  credentialSource(): CredentialSource {
    return this.resolve()?.source ?? CredentialSource.NONE;
  }

  private resolve(): ResolvedCookies | null {
    const { accessToken, phpsessid, environment, configDir } = this.options;

    if (accessToken && phpsessid) {
      return { token: accessToken, sessid: phpsessid, source: CredentialSource.CONSTRUCTOR };
    }

    if (environment?.accessToken && environment.phpsessid) {
      return {
        token: environment.accessToken,
        sessid: environment.phpsessid,
        source: CredentialSource.ENVIRONMENT,
      };
    }

    const stored = loadStoredCredentials(configDir);
    if (stored.access_token && stored.phpsessid) {
      return {
        token: stored.access_token,
        sessid: stored.phpsessid,
        source: CredentialSource.CREDENTIALS_FILE,
      };
    }

    return null;
  }
}

/**
 * Serialize cookies into a Cookie header value
 */
export function formatCookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Decide whether a request targets the web host
 */
function targetsHost(config: InternalAxiosRequestConfig, host: string): boolean {
  try {
    return new URL(config.url ?? '', config.baseURL).host === host;
  } catch {
    return false;
  }
}

/**
 * Install a request interceptor that adds session credentials to requests
 * for the web host
 *
 * Unauthenticated runs send requests unchanged; the upstream 401 then
 * surfaces as AuthenticationRequiredError in the repository.
 *
 * @param instance - Shared axios instance
 * @param auth - Credential source
 * @param webBaseUrl - Base URL of the session-authenticated web API
 * @returns Interceptor id, for eject
 */
export function applySessionAuth(
  instance: AxiosInstance,
  auth: AuthProvider,
  webBaseUrl: string
): number {
  const webHost = new URL(webBaseUrl).host;

  return instance.interceptors.request.use((config) => {
    if (!targetsHost(config, webHost)) {
      return config;
    }
    const resolved = auth.resolveCredentials();
    if (!resolved) {
      return config;
    }

    const { credentials, source } = resolved;
    config.headers.set('Cookie', formatCookieHeader(credentials.cookies));
    for (const [name, value] of Object.entries(credentials.headers)) {
      config.headers.set(name, value);
    }
    log(LogLevel.DEBUG, 'Attached session credentials', { host: webHost, source });
    return config;
  });
}
