/**
 * Player Service
 *
 * Business logic layer for player profiles.
 */

import { ChessComRepository } from '../repositories/chesscom-repository';
import { PlayerProfile } from '../models/player';

export class PlayerService {
  constructor(private readonly repository: ChessComRepository) {}

  /**
   * Get a player profile
   *
   * @throws NotFoundError if the player does not exist
   */
  async getPlayer(username: string): Promise<PlayerProfile> {
    return this.repository.findPlayer(username.trim());
  }
}
