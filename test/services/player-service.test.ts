/**
 * Player Service Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { NotFoundError } from '../../src/models/errors';
import { ChessComRepository } from '../../src/repositories/chesscom-repository';
import { PlayerService } from '../../src/services/player-service';
import { API, FakeHttpClient, ok, WEB } from '../helpers/fake-http-client';

describe('PlayerService', () => {
  let fake: FakeHttpClient;
  let service: PlayerService;

  beforeEach(() => {
    fake = new FakeHttpClient();
    service = new PlayerService(new ChessComRepository(fake, { apiBaseUrl: API, webBaseUrl: WEB }));
  });

  it('should trim the username before the lookup', async () => {
    fake.on(`${API}/player/alice`, ok({ username: 'alice', status: 'premium' }));

    const profile = await service.getPlayer('  alice ');

    expect(profile.status).toBe('premium');
    expect(fake.calls).toEqual([`${API}/player/alice`]);
  });

  it('should report unknown players', async () => {
    await expect(service.getPlayer('ghost')).rejects.toThrow(new NotFoundError('Player "ghost" not found'));
  });
});
