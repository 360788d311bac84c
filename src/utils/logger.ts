/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. Every entry carries the run id, a timestamp and its
 * level. Entries are written to stderr so command output on stdout stays
 * machine-readable. Session secrets are redacted before writing.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  run_id?: string;
}

/**
 * Upstream request log entry
 */
interface UpstreamRequestLogEntry extends BaseLogEntry {
  log_type: 'UPSTREAM_REQUEST';
  method: string;
  url: string;
  status_code: number;
  latency_ms: number;
  cached: boolean;
}

/**
 * Cache storage failure log entry
 */
interface CacheFailureLogEntry extends BaseLogEntry {
  log_type: 'CACHE_FAILURE';
  operation: string;
  error_message: string;
  key_preview?: string;
}

/**
 * Fields carrying session secrets
 */
const SECRET_FIELDS = [
  'access_token',
  'accesstoken',
  'phpsessid',
  'cookie',
  'authorization',
];

const SECRET_PATTERNS = {
  accessTokenCookie: /ACCESS_TOKEN=[^;\s]+/g,
  sessionCookie: /PHPSESSID=[^;\s]+/g,
};

let minimumLevel: LogLevel = LogLevel.WARN;
let runId: string | undefined;

/**
 * Set the minimum level and the run id stamped on every entry
 */
export function configureLogger(options: { level?: string; runId?: string }): void {
  if (options.level) {
    const candidate = options.level.toUpperCase();
    const match = Object.values(LogLevel).find((level) => level === candidate);
    if (match) {
      minimumLevel = match;
    }
  }
  if (options.runId !== undefined) {
    runId = options.runId;
  }
}

/**
 * Sanitize string by removing cookie values
 */
function sanitizeString(value: string): string {
  return value
    .replace(SECRET_PATTERNS.accessTokenCookie, 'ACCESS_TOKEN=[REDACTED]')
    .replace(SECRET_PATTERNS.sessionCookie, 'PHPSESSID=[REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Error) {
    return sanitizeString(value.message);
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeObject(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Sanitize object by removing secret fields and cookie values
 */
function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];
}

/**
 * Write log entry to stderr
 */
function writeLog(entry: BaseLogEntry): void {
  if (!isEnabled(entry.level)) {
    return;
  }
  console.error(JSON.stringify(entry));
}

/**
 * Log an upstream GET request
 *
 * Cache hits are logged too so a run's network footprint can be read off
 * the log. 4xx entries are WARN and 5xx ERROR.
 *
 * @example
 * ```typescript
 * logUpstreamRequest({
 *   url: 'https://api.chess.com/pub/club/demo-club',
 *   statusCode: 200,
 *   latencyMs: 45,
 *   cached: false,
 * });
 * ```
 */
export function logUpstreamRequest(params: {
  method?: string;
  url: string;
  statusCode: number;
  latencyMs: number;
  cached: boolean;
}): void {
  const entry: UpstreamRequestLogEntry = {
    timestamp: new Date().toISOString(),
    level:
      params.statusCode >= 500
        ? LogLevel.ERROR
        : params.statusCode >= 400
        ? LogLevel.WARN
        : LogLevel.DEBUG,
    log_type: 'UPSTREAM_REQUEST',
    run_id: runId,
    method: params.method ?? 'GET',
    url: sanitizeString(params.url),
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
    cached: params.cached,
  };

  writeLog(entry);
}

/**
 * Log a cache storage failure
 *
 * Storage failures never change results, so they are WARN, not ERROR.
 */
export function logCacheFailure(params: {
  operation: string;
  error: unknown;
  key?: string;
}): void {
  const message =
    params.error instanceof Error ? params.error.message : String(params.error);

  const entry: CacheFailureLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.WARN,
    log_type: 'CACHE_FAILURE',
    run_id: runId,
    operation: params.operation,
    error_message: sanitizeString(message),
    key_preview:
      params.key === undefined
        ? undefined
        : params.key.length > 120
        ? params.key.substring(0, 120) + '...'
        : params.key,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Participants resolved', {
 *   tournament_id: '900',
 *   source: 'leaderboard',
 *   count: 12,
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    run_id: runId,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
