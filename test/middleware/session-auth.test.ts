/**
 * Session Auth Middleware Tests
 *
 * Covers credential resolution order and the axios request interceptor
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import axios, { InternalAxiosRequestConfig } from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { saveStoredCredentials } from '../../src/config/credentials';
import {
  applySessionAuth,
  CookieAuthProvider,
  formatCookieHeader,
} from '../../src/middleware/session-auth';
import {
  AuthCredentials,
  AuthProvider,
  CredentialSource,
  ResolvedCredentials,
} from '../../src/models/auth';
import { AuthenticationRequiredError } from '../../src/models/errors';
import { scriptedAdapter } from '../helpers/axios-adapter';

describe('CookieAuthProvider', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clubscan-auth-'));
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  it('should prefer constructor values', () => {
    saveStoredCredentials(configDir, 'file-token', 'file-session');
    const auth = new CookieAuthProvider({
      accessToken: 'ctor-token',
      phpsessid: 'ctor-session',
      environment: { accessToken: 'env-token', phpsessid: 'env-session' },
      configDir,
    });

    expect(auth.credentialSource()).toBe(CredentialSource.CONSTRUCTOR);
    expect(auth.getCredentials().cookies).toEqual({
      ACCESS_TOKEN: 'ctor-token',
      PHPSESSID: 'ctor-session',
    });
  });

  it('should fall back to environment values', () => {
    const auth = new CookieAuthProvider({
      accessToken: 'ctor-token',
      environment: { accessToken: 'env-token', phpsessid: 'env-session' },
      configDir,
    });

    expect(auth.credentialSource()).toBe(CredentialSource.ENVIRONMENT);
    expect(auth.getCredentials().cookies.ACCESS_TOKEN).toBe('env-token');
  });

  it('should fall back to the credentials file', () => {
    saveStoredCredentials(configDir, 'file-token', 'file-session');
    const auth = new CookieAuthProvider({
      environment: { accessToken: '', phpsessid: '' },
      configDir,
    });

    expect(auth.isAuthenticated()).toBe(true);
    expect(auth.credentialSource()).toBe(CredentialSource.CREDENTIALS_FILE);
    expect(auth.getCredentials().cookies.PHPSESSID).toBe('file-session');
  });

  it('should resolve credentials and their source in one pass', () => {
    saveStoredCredentials(configDir, 'file-token', 'file-session');
    const auth = new CookieAuthProvider({ configDir });

    expect(auth.resolveCredentials()).toEqual({
      credentials: {
        headers: {},
        cookies: { ACCESS_TOKEN: 'file-token', PHPSESSID: 'file-session' },
      },
      source: CredentialSource.CREDENTIALS_FILE,
    });
  });

  it('should throw with the setup hint when nothing resolves', () => {
    const auth = new CookieAuthProvider({ configDir });

    expect(auth.isAuthenticated()).toBe(false);
    expect(auth.resolveCredentials()).toBeNull();
    expect(auth.credentialSource()).toBe(CredentialSource.NONE);
    expect(() => auth.getCredentials()).toThrow(AuthenticationRequiredError);
    expect(() => auth.getCredentials()).toThrow(
      "Session credentials not found. Run 'clubscan auth setup' to configure credentials."
    );
  });
});

describe('formatCookieHeader', () => {
  it('should join cookies with semicolons', () => {
    expect(formatCookieHeader({ ACCESS_TOKEN: 'a', PHPSESSID: 'b' })).toBe(
      'ACCESS_TOKEN=a; PHPSESSID=b'
    );
  });
});

/**
 * Auth provider recording how often each method is used
 */
class CountingAuthProvider implements AuthProvider {
  calls = { resolveCredentials: 0, getCredentials: 0, isAuthenticated: 0, credentialSource: 0 };

  constructor(private readonly resolved: ResolvedCredentials | null) {}

  resolveCredentials(): ResolvedCredentials | null {
    this.calls.resolveCredentials++;
    return this.resolved;
  }

  getCredentials(): AuthCredentials {
    this.calls.getCredentials++;
    if (!this.resolved) {
      throw new AuthenticationRequiredError('no credentials');
    }
    return this.resolved.credentials;
  }

  isAuthenticated(): boolean {
    this.calls.isAuthenticated++;
    return this.resolved !== null;
  }

  credentialSource(): CredentialSource {
    this.calls.credentialSource++;
    return this.resolved?.source ?? CredentialSource.NONE;
  }
}

describe('applySessionAuth', () => {
  const configDir = path.join(os.tmpdir(), 'clubscan-auth-missing');
  let seen: InternalAxiosRequestConfig[];

  const instanceWith = (auth: AuthProvider) => {
    const instance = axios.create({ validateStatus: () => true });
    instance.defaults.adapter = scriptedAdapter([{ status: 200 }], seen);
    applySessionAuth(instance, auth, 'https://www.chess.com');
    return instance;
  };

  beforeEach(() => {
    seen = [];
  });

  it('should attach cookies to web host requests', async () => {
    const instance = instanceWith(
      new CookieAuthProvider({ accessToken: 'test-token', phpsessid: 'test-session', configDir })
    );

    await instance.get('https://www.chess.com/callback/live/tournament/900/leaderboard');

    expect(seen[0].headers.get('Cookie')).toBe('ACCESS_TOKEN=test-token; PHPSESSID=test-session');
  });

  it('should not attach cookies to the public API', async () => {
    const instance = instanceWith(
      new CookieAuthProvider({ accessToken: 'test-token', phpsessid: 'test-session', configDir })
    );

    await instance.get('https://api.chess.com/pub/club/demo-club');

    expect(seen[0].headers.has('Cookie')).toBe(false);
  });

  it('should send web requests unchanged without credentials', async () => {
    const instance = instanceWith(
      new CookieAuthProvider({ environment: { accessToken: '', phpsessid: '' }, configDir })
    );

    await instance.get('https://www.chess.com/callback/clubs/live/past/42');

    expect(seen[0].headers.has('Cookie')).toBe(false);
  });

  it('should resolve credentials once per web request', async () => {
    const auth = new CountingAuthProvider({
      credentials: { headers: { 'X-Session': 'test-secret' }, cookies: { ACCESS_TOKEN: 'test-token' } },
      source: CredentialSource.ENVIRONMENT,
    });
    const instance = instanceWith(auth);

    await instance.get('https://www.chess.com/callback/clubs/live/past/42');

    expect(auth.calls).toEqual({
      resolveCredentials: 1,
      getCredentials: 0,
      isAuthenticated: 0,
      credentialSource: 0,
    });
    expect(seen[0].headers.get('Cookie')).toBe('ACCESS_TOKEN=test-token');
    expect(seen[0].headers.get('X-Session')).toBe('test-secret');
  });

  it('should not resolve credentials for public API requests', async () => {
    const auth = new CountingAuthProvider(null);

    await instanceWith(auth).get('https://api.chess.com/pub/player/alice');

    expect(auth.calls.resolveCredentials).toBe(0);
  });
});
