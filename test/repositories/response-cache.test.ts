/**
 * Response Cache Repository Tests
 *
 * Runs against a temporary directory with an injected clock.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { createHash } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseEntry, ResponseCache } from '../../src/repositories/response-cache';

const KEY = 'https://api.chess.com/pub/player/alice/games/2024/03';

describe('ResponseCache', () => {
  let dir: string;
  let now: number;
  let cache: ResponseCache;
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  const entryFile = (key: string) =>
    path.join(dir, `${createHash('sha256').update(key).digest('hex')}.json`);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clubscan-cache-'));
    now = 1_700_000_000;
    cache = new ResponseCache({ cacheDir: dir, now: () => now });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('get / set', () => {
    it('should return undefined for an unknown key', async () => {
      expect(await cache.get(KEY)).toBeUndefined();
    });

    it('should return the stored body unchanged', async () => {
      const body = { games: [{ url: 'https://www.chess.com/game/live/1', end_time: 5 }] };
      await cache.set(KEY, body, 60);
      expect(await cache.get(KEY)).toEqual(body);
    });

    it('should persist one record per key named by its SHA-256', async () => {
      await cache.set(KEY, { a: 1 }, 60);

      const record = JSON.parse(fs.readFileSync(entryFile(KEY), 'utf8'));
      expect(record).toEqual({ key: KEY, expires_at: now + 60, body: { a: 1 } });
      expect(fs.readdirSync(dir)).toEqual([path.basename(entryFile(KEY))]);
    });

    it('should overwrite an existing entry', async () => {
      await cache.set(KEY, { v: 1 }, 60);
      await cache.set(KEY, { v: 2 }, 60);
      expect(await cache.get(KEY)).toEqual({ v: 2 });
    });

    it('should skip non-positive TTLs and undefined bodies', async () => {
      await cache.set(KEY, { a: 1 }, 0);
      await cache.set('other', undefined, 60);
      expect(fs.readdirSync(dir)).toEqual([]);
    });

    it('should store null bodies', async () => {
      await cache.set(KEY, null, 60);
      expect(await cache.lookup(KEY)).toEqual({ status: 'hit', body: null });
    });

    it('should create the cache directory lazily', async () => {
      const nested = path.join(dir, 'a', 'b');
      const lazy = new ResponseCache({ cacheDir: nested, now: () => now });
      expect(fs.existsSync(nested)).toBe(false);

      await lazy.set(KEY, { a: 1 }, 60);

      expect(await lazy.get(KEY)).toEqual({ a: 1 });
    });
  });

  describe('expiry', () => {
    it('should serve an entry up to and including its expiry second', async () => {
      await cache.set(KEY, { a: 1 }, 100);
      now += 100;
      expect(await cache.get(KEY)).toEqual({ a: 1 });
    });

    it('should miss and delete the entry once expired', async () => {
      await cache.set(KEY, { a: 1 }, 100);
      now += 101;

      expect(await cache.get(KEY)).toBeUndefined();
      expect(fs.existsSync(entryFile(KEY))).toBe(false);
    });
  });

  describe('unreadable records', () => {
    it('should treat a corrupt record as a miss and delete it', async () => {
      await cache.set(KEY, { a: 1 }, 60);
      fs.writeFileSync(entryFile(KEY), '{"key":');

      expect(await cache.lookup(KEY)).toEqual({ status: 'miss' });
      expect(fs.existsSync(entryFile(KEY))).toBe(false);
    });

    it('should miss when the stored key differs', async () => {
      fs.writeFileSync(entryFile(KEY), JSON.stringify({ key: 'other', expires_at: now + 60, body: 1 }));
      expect(await cache.get(KEY)).toBeUndefined();
    });
  });

  describe('storage failures', () => {
    it('should degrade to a miss and a no-op when the directory cannot be created', async () => {
      const blocker = path.join(dir, 'blocker');
      fs.writeFileSync(blocker, 'not a directory');
      const broken = new ResponseCache({ cacheDir: path.join(blocker, 'cache'), now: () => now });

      await expect(broken.set(KEY, { a: 1 }, 60)).resolves.toBeUndefined();
      expect(await broken.get(KEY)).toBeUndefined();
      expect((await broken.lookup(KEY)).status).toBe('unavailable');
      expect(await broken.clear()).toBe(0);
      expect(await broken.purgeExpired()).toBe(0);
      expect(await broken.stats()).toEqual({ total: 0, active: 0, expired: 0, sizeBytes: 0 });

      const logged = errorSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
      expect(logged.every((entry) => entry.log_type === 'CACHE_FAILURE')).toBe(true);
      expect(logged.map((entry) => entry.operation)).toEqual([
        'set',
        'get',
        'clear',
        'purge-expired',
        'stats',
      ]);
    });
  });

  describe('maintenance', () => {
    beforeEach(async () => {
      await cache.set('live', { a: 1 }, 1000);
      await cache.set('stale-1', { a: 2 }, 10);
      await cache.set('stale-2', { a: 3 }, 10);
      now += 11;
    });

    it('should report active and expired entries', async () => {
      const stats = await cache.stats();
      expect(stats.total).toBe(3);
      expect(stats.active).toBe(1);
      expect(stats.expired).toBe(2);
      expect(stats.sizeBytes).toBeGreaterThan(0);
    });

    it('should count unreadable records as expired', async () => {
      fs.writeFileSync(path.join(dir, 'junk.json'), 'garbage');
      const stats = await cache.stats();
      expect(stats.total).toBe(4);
      expect(stats.expired).toBe(3);
    });

    it('should purge expired entries only', async () => {
      expect(await cache.purgeExpired()).toBe(2);
      expect(await cache.get('live')).toEqual({ a: 1 });
      expect((await cache.stats()).total).toBe(1);
    });

    it('should clear every entry', async () => {
      expect(await cache.clear()).toBe(3);
      expect(fs.readdirSync(dir)).toEqual([]);
    });
  });
});

describe('parseEntry', () => {
  it('should accept a complete record', () => {
    expect(parseEntry('{"key":"k","expires_at":5,"body":[1]}')).toEqual({
      key: 'k',
      expires_at: 5,
      body: [1],
    });
  });

  it('should reject invalid records', () => {
    expect(parseEntry('nope')).toBeNull();
    expect(parseEntry('null')).toBeNull();
    expect(parseEntry('{"key":"k","expires_at":"5","body":1}')).toBeNull();
    expect(parseEntry('{"key":"k","expires_at":5}')).toBeNull();
  });
});
