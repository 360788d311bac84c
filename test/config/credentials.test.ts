/**
 * Stored Credentials Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  clearStoredCredentials,
  credentialsPath,
  loadStoredCredentials,
  saveStoredCredentials,
} from '../../src/config/credentials';

describe('stored credentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clubscan-credentials-'));
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return nothing when no file exists', () => {
    expect(loadStoredCredentials(dir)).toEqual({});
  });

  it('should save and load credentials', () => {
    const configDir = path.join(dir, 'nested');

    const file = saveStoredCredentials(configDir, 'test-token', 'test-session');

    expect(file).toBe(path.join(configDir, 'credentials.json'));
    expect(loadStoredCredentials(configDir)).toEqual({
      access_token: 'test-token',
      phpsessid: 'test-session',
    });
  });

  it('should write the file readable by the owner only', () => {
    const file = saveStoredCredentials(dir, 'test-token', 'test-session');
    if (process.platform !== 'win32') {
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    }
  });

  it('should ignore an unparsable file', () => {
    fs.writeFileSync(credentialsPath(dir), '{not json');
    expect(loadStoredCredentials(dir)).toEqual({});
  });

  it('should ignore fields of the wrong type', () => {
    fs.writeFileSync(credentialsPath(dir), JSON.stringify({ access_token: 7, phpsessid: 'test-session' }));
    expect(loadStoredCredentials(dir)).toEqual({ phpsessid: 'test-session' });
  });

  it('should report whether a file was removed', () => {
    saveStoredCredentials(dir, 'test-token', 'test-session');

    expect(clearStoredCredentials(dir)).toBe(true);
    expect(clearStoredCredentials(dir)).toBe(false);
    expect(fs.existsSync(credentialsPath(dir))).toBe(false);
  });
});
