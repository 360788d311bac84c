/**
 * Game fixtures
 */

import { Game, GameResult } from '../../src/models/game';

export function makeGame(overrides: Partial<Game> = {}): Game {
  return {
    white: 'alice',
    black: 'bob',
    result: GameResult.DRAW,
    openingEco: null,
    pgn: null,
    playedAt: 1700000000,
    whiteAccuracy: null,
    blackAccuracy: null,
    tournamentId: null,
    url: null,
    ...overrides,
  };
}
