/**
 * Response Cache Repository
 *
 * Disk-backed key/value store for upstream JSON bodies with a per-entry
 * expiry. One file per key, named after the SHA-256 of the key:
 *
 *   {cacheDir}/{sha256(key)}.json  ->  { key, expires_at, body }
 *
 * Writes land in a temp file that is renamed over the entry, so a reader
 * never sees a partial record and concurrent writers resolve to the last
 * rename. Expired entries are deleted lazily on read; only purgeExpired
 * sweeps them eagerly.
 *
 * Storage failures are absorbed: lookups degrade to a miss, writes to a
 * no-op, maintenance operations to zero. Every failure is logged.
 */

import { createHash, randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { CacheEntry, CacheLookup, CacheStats } from '../models/cache';
import { logCacheFailure } from '../utils/logger';

const ENTRY_SUFFIX = '.json';

export interface ResponseCacheOptions {
  cacheDir: string;
  now?: () => number;                // Unix seconds, injectable for tests
}

/**
 * Response Cache
 * Persists successful response bodies under caller-chosen TTLs
 */
export class ResponseCache {
  private readonly cacheDir: string;
  private readonly now: () => number;
  private ready: Promise<Error | null> | null = null;

  constructor(options: ResponseCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  /**
   * Return the cached body, or undefined on miss, expiry or storage failure
   *
   * @param key - Canonical request key
   */
  async get(key: string): Promise<unknown | undefined> {
    const result = await this.lookup(key);
    if (result.status === 'unavailable') {
      logCacheFailure({ operation: 'get', error: result.error, key });
      return undefined;
    }
    return result.status === 'hit' ? result.body : undefined;
  }

  /**
   * Tri-state lookup. Expired and unreadable records are deleted.
   *
   * @param key - Canonical request key
   */
  async lookup(key: string): Promise<CacheLookup> {
    const initError = await this.ensureReady();
    if (initError) {
      return { status: 'unavailable', error: initError };
    }

    const file = this.entryPath(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { status: 'miss' };
      }
      return { status: 'unavailable', error: toError(error) };
    }

    const entry = parseEntry(raw);
    if (!entry) {
      await this.remove(file);
      return { status: 'miss' };
    }
    if (entry.key !== key) {
      return { status: 'miss' };
    }
    if (this.now() > entry.expires_at) {
      await this.remove(file);
      return { status: 'miss' };
    }
    return { status: 'hit', body: entry.body };
  }

  /**
   * Store a body for ttlSeconds
   *
   * Callers only pass bodies of HTTP 200 responses.
   *
   * @param key - Canonical request key
   * @param body - JSON-serializable body
   * @param ttlSeconds - Seconds until the entry expires
   */
  async set(key: string, body: unknown, ttlSeconds: number): Promise<void> {
    if (body === undefined || ttlSeconds <= 0) {
      return;
    }
    const initError = await this.ensureReady();
    if (initError) {
      logCacheFailure({ operation: 'set', error: initError, key });
      return;
    }

    const entry: CacheEntry = {
      key,
      expires_at: this.now() + ttlSeconds,
      body,
    };

    const file = this.entryPath(key);
    const tempFile = `${file}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await fs.writeFile(tempFile, JSON.stringify(entry), 'utf8');
      await fs.rename(tempFile, file);
    } catch (error) {
      logCacheFailure({ operation: 'set', error, key });
      await fs.rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
        logCacheFailure({ operation: 'set-cleanup', error: cleanupError, key });
      });
    }
  }

  /**
   * Delete every entry
   *
   * @returns Number of entries removed
   */
  async clear(): Promise<number> {
    let removed = 0;
    for (const file of await this.listEntryFiles('clear')) {
      if (await this.remove(file)) {
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Delete expired and unreadable entries, keeping live ones
   *
   * @returns Number of entries removed
   */
  async purgeExpired(): Promise<number> {
    let removed = 0;
    const now = this.now();
    for (const file of await this.listEntryFiles('purge-expired')) {
      const entry = await this.readEntryFile(file);
      if (entry === undefined) {
        continue;
      }
      if (entry === null || now > entry.expires_at) {
        if (await this.remove(file)) {
          removed += 1;
        }
      }
    }
    return removed;
  }

  /**
   * Count entries and their on-disk size. Unreadable records count as
   * expired since the next read deletes them.
   */
  async stats(): Promise<CacheStats> {
    const stats: CacheStats = { total: 0, active: 0, expired: 0, sizeBytes: 0 };
    const now = this.now();

    for (const file of await this.listEntryFiles('stats')) {
      let size: number;
      try {
        size = (await fs.stat(file)).size;
      } catch (error) {
        if (!isMissingFile(error)) {
          logCacheFailure({ operation: 'stats', error });
        }
        continue;
      }

      const entry = await this.readEntryFile(file);
      if (entry === undefined) {
        continue;
      }
      stats.total += 1;
      stats.sizeBytes += size;
      if (entry !== null && now <= entry.expires_at) {
        stats.active += 1;
      } else {
        stats.expired += 1;
      }
    }

    return stats;
  }

  /**
   * Create the cache directory on first use. Resolves to the failure, if any.
   */
  private ensureReady(): Promise<Error | null> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.cacheDir, { recursive: true }).then(
        () => null,
        (error: unknown) => toError(error)
      );
    }
    return this.ready;
  }

  private entryPath(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');
    return path.join(this.cacheDir, `${digest}${ENTRY_SUFFIX}`);
  }

  private async listEntryFiles(operation: string): Promise<string[]> {
    const initError = await this.ensureReady();
    if (initError) {
      logCacheFailure({ operation, error: initError });
      return [];
    }
    try {
      const names = await fs.readdir(this.cacheDir);
      return names
        .filter((name) => name.endsWith(ENTRY_SUFFIX))
        .map((name) => path.join(this.cacheDir, name));
    } catch (error) {
      logCacheFailure({ operation, error });
      return [];
    }
  }

  /**
   * Read a record file: the entry, null when unreadable, undefined when the
   * file vanished or storage failed
   */
  private async readEntryFile(file: string): Promise<CacheEntry | null | undefined> {
    try {
      return parseEntry(await fs.readFile(file, 'utf8'));
    } catch (error) {
      if (!isMissingFile(error)) {
        logCacheFailure({ operation: 'read', error });
      }
      return undefined;
    }
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await fs.unlink(file);
      return true;
    } catch (error) {
      if (!isMissingFile(error)) {
        logCacheFailure({ operation: 'delete', error });
      }
      return false;
    }
  }
}

/**
 * Parse a stored record, or null when it is not a valid entry
 */
export function parseEntry(raw: string): CacheEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('key' in parsed) ||
    !('expires_at' in parsed) ||
    !('body' in parsed)
  ) {
    return null;
  }

  const { key, expires_at, body } = parsed;
  if (typeof key !== 'string' || typeof expires_at !== 'number') {
    return null;
  }
  return { key, expires_at, body };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
