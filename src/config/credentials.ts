/**
 * Stored Session Credentials
 *
 * Reads and writes {configDir}/credentials.json, which holds the
 * ACCESS_TOKEN and PHPSESSID cookie values. The file is written with
 * owner-only permissions.
 */

import fs from 'fs';
import path from 'path';
import { StoredCredentials } from '../models/auth';
import { log, LogLevel } from '../utils/logger';

export const CREDENTIALS_FILE = 'credentials.json';

export function credentialsPath(configDir: string): string {
  return path.join(configDir, CREDENTIALS_FILE);
}

/**
 * Load stored credentials
 *
 * @returns The stored values, or an empty object when the file is missing
 * or unreadable
 */
export function loadStoredCredentials(configDir: string): StoredCredentials {
  const file = credentialsPath(configDir);
  if (!fs.existsSync(file)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    log(LogLevel.WARN, 'Ignoring unreadable credentials file', {
      file,
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }

  const stored: StoredCredentials = {};
  if ('access_token' in parsed && typeof parsed.access_token === 'string') {
    stored.access_token = parsed.access_token;
  }
  if ('phpsessid' in parsed && typeof parsed.phpsessid === 'string') {
    stored.phpsessid = parsed.phpsessid;
  }
  return stored;
}

/**
 * Persist credentials, creating the config directory when needed
 *
 * @returns Path of the written file
 */
export function saveStoredCredentials(
  configDir: string,
  accessToken: string,
  phpsessid: string
): string {
  fs.mkdirSync(configDir, { recursive: true });
  const file = credentialsPath(configDir);
  const credentials: StoredCredentials = {
    access_token: accessToken,
    phpsessid,
  };
  fs.writeFileSync(file, JSON.stringify(credentials, null, 2), {
    encoding: 'utf8',
    mode: 0o600,
  });
  fs.chmodSync(file, 0o600);
  return file;
}

/**
 * Remove stored credentials
 *
 * @returns true when a file was deleted
 */
export function clearStoredCredentials(configDir: string): boolean {
  const file = credentialsPath(configDir);
  if (!fs.existsSync(file)) {
    return false;
  }
  fs.unlinkSync(file);
  return true;
}
