/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * The resulting struct is passed to constructors explicitly; nothing below
 * src/config reads process.env.
 */

import os from 'os';
import path from 'path';

export interface EnvironmentConfig {
  // Storage locations
  cacheDir: string;
  configDir: string;

  // Upstream configuration
  apiBaseUrl: string;
  webBaseUrl: string;
  userAgent: string;
  httpTimeoutMs: number;

  // Reconstruction tuning
  endBufferSeconds: number;
  requestDelayMs: number;

  // Application configuration
  cacheEnabled: boolean;
  logLevel: string;

  // Session credentials (optional, see CookieAuthProvider)
  accessToken: string;
  phpsessid: string;
}

export const DEFAULT_API_BASE_URL = 'https://api.chess.com/pub';
export const DEFAULT_WEB_BASE_URL = 'https://www.chess.com';
export const DEFAULT_USER_AGENT = 'clubscan/0.1.0 (Node.js command-line client)';

/**
 * Hours added after a tournament's reported end. Upstream end times mark
 * the scheduled close, not the last game.
 */
export const DEFAULT_END_BUFFER_HOURS = 6;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'];

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const home = os.homedir();
  return {
    cacheDir: env.CLUBSCAN_CACHE_DIR || path.join(home, '.cache', 'clubscan'),
    configDir: env.CLUBSCAN_CONFIG_DIR || path.join(home, '.config', 'clubscan'),
    apiBaseUrl: stripTrailingSlash(env.CLUBSCAN_API_BASE_URL || DEFAULT_API_BASE_URL),
    webBaseUrl: stripTrailingSlash(env.CLUBSCAN_WEB_BASE_URL || DEFAULT_WEB_BASE_URL),
    userAgent: env.CLUBSCAN_USER_AGENT || DEFAULT_USER_AGENT,
    httpTimeoutMs: parseInt(env.CLUBSCAN_HTTP_TIMEOUT_MS || '10000', 10),
    endBufferSeconds: Math.round(
      parseFloat(env.CLUBSCAN_END_BUFFER_HOURS || String(DEFAULT_END_BUFFER_HOURS)) * 3600
    ),
    requestDelayMs: parseInt(env.CLUBSCAN_REQUEST_DELAY_MS || '100', 10),
    cacheEnabled: (env.CLUBSCAN_CACHE || 'on').toLowerCase() !== 'off',
    logLevel: (env.LOG_LEVEL || 'warn').toLowerCase(),
    accessToken: env.CHESSCOM_ACCESS_TOKEN || '',
    phpsessid: env.CHESSCOM_PHPSESSID || '',
  };
}

/**
 * Validate that numeric and enumerated settings are usable
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const numericFields: (keyof EnvironmentConfig)[] = [
    'httpTimeoutMs',
    'endBufferSeconds',
    'requestDelayMs',
  ];

  const invalidFields = numericFields.filter((field) => {
    const value = config[field];
    return typeof value !== 'number' || !Number.isFinite(value) || value < 0;
  });

  if (invalidFields.length > 0) {
    throw new Error(
      `Invalid numeric configuration values: ${invalidFields.join(', ')}`
    );
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    throw new Error(
      `Invalid LOG_LEVEL "${config.logLevel}", expected one of: ${LOG_LEVELS.join(', ')}`
    );
  }
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
