/**
 * Chess.com Provider Tests
 *
 * Checks the wiring from configuration to services
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { EnvironmentConfig, loadEnvironmentConfig } from '../../src/config/environment';
import { TournamentFormat } from '../../src/models/tournament';
import { createChessComProvider } from '../../src/providers/chesscom-provider';
import { FakeHttpClient, ok } from '../helpers/fake-http-client';

describe('createChessComProvider', () => {
  let dir: string;
  let config: EnvironmentConfig;
  let fake: FakeHttpClient;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clubscan-provider-'));
    config = {
      ...loadEnvironmentConfig({}),
      cacheDir: path.join(dir, 'cache'),
      configDir: path.join(dir, 'config'),
      apiBaseUrl: 'http://api.test/pub',
      webBaseUrl: 'http://web.test',
      requestDelayMs: 0,
    };
    fake = new FakeHttpClient();
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should use the configured base URLs', async () => {
    fake.on('http://api.test/pub/player/alice', ok({ username: 'alice', title: 'WGM' }));
    fake.on('http://web.test/callback/live-tournament/900/leaderboard', ok({ players: [{ username: 'bob', rank: 1 }] }));
    const provider = createChessComProvider(config, { httpClient: fake });

    expect((await provider.getPlayer(' alice ')).title).toBe('WGM');
    const results = await provider.getTournamentResults('900', TournamentFormat.SWISS);
    expect(results.map((r) => r.player)).toEqual(['bob']);
  });

  it('should cache responses when caching is enabled', async () => {
    fake.on('http://api.test/pub/player/alice', ok({ username: 'alice' }));
    const provider = createChessComProvider(config, { httpClient: fake });

    await provider.getPlayer('alice');
    await provider.getPlayer('alice');

    expect(fake.calls).toHaveLength(1);
    expect(fs.readdirSync(config.cacheDir)).toHaveLength(1);
  });

  it('should go to the network every time when caching is off', async () => {
    fake.on('http://api.test/pub/player/alice', ok({ username: 'alice' }));
    const provider = createChessComProvider({ ...config, cacheEnabled: false }, { httpClient: fake });

    await provider.getPlayer('alice');
    await provider.getPlayer('alice');

    expect(fake.calls).toHaveLength(2);
    expect(fs.existsSync(config.cacheDir)).toBe(false);
  });
});
