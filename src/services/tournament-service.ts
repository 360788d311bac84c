/**
 * Tournament Service
 *
 * Business logic layer for tournament standings. Upstream serves Swiss and
 * arena leaderboards under different URL shapes and a tournament's listed
 * format does not always match the shape that answers, so both are probed.
 */

import { ChessComRepository } from '../repositories/chesscom-repository';
import { TournamentFormat, TournamentResult } from '../models/tournament';
import { log, LogLevel } from '../utils/logger';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';

/**
 * Attempts per leaderboard URL while rate limited
 */
export const LEADERBOARD_MAX_ATTEMPTS = 3;

/**
 * First backoff delay; doubles after every rate-limited attempt (1s, 2s, 4s)
 */
export const LEADERBOARD_BACKOFF_BASE_MS = 1000;

/**
 * Tournament Service
 * Provides leaderboard retrieval with format fallback and backoff
 */
export class TournamentService {
  private readonly sleep: Sleep;

  constructor(
    private readonly repository: ChessComRepository,
    options: { sleep?: Sleep } = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Get the final standings of a tournament
   *
   * The shape matching `format` is tried first; a 404 moves on to the other
   * shape. A URL that stays rate limited yields an empty list without
   * probing further.
   *
   * @param tournamentId - Platform tournament id
   * @param format - Listed format, decides which shape goes first
   * @returns Standings in upstream order, or [] when unavailable
   * @throws AuthenticationRequiredError if the session is missing or rejected
   */
  async getTournamentResults(
    tournamentId: string,
    format: TournamentFormat = TournamentFormat.ARENA
  ): Promise<TournamentResult[]> {
    const shapes =
      format === TournamentFormat.SWISS
        ? [TournamentFormat.SWISS, TournamentFormat.ARENA]
        : [TournamentFormat.ARENA, TournamentFormat.SWISS];

    for (const shape of shapes) {
      const results = await this.tryLeaderboard(tournamentId, shape);
      if (results !== null) {
        return results;
      }
    }

    log(LogLevel.INFO, 'No leaderboard found under either URL shape', {
      tournament_id: tournamentId,
    });
    return [];
  }

  /**
   * Fetch one leaderboard shape, backing off while rate limited
   *
   * @returns Results, null on 404, [] once attempts are exhausted
   */
  private async tryLeaderboard(
    tournamentId: string,
    shape: TournamentFormat
  ): Promise<TournamentResult[] | null> {
    for (let attempt = 0; attempt < LEADERBOARD_MAX_ATTEMPTS; attempt++) {
      const lookup = await this.repository.findLeaderboard(tournamentId, shape);

      if (lookup.status === 'found') {
        return lookup.value;
      }
      if (lookup.status === 'not_found') {
        return null;
      }

      const backoffMs = LEADERBOARD_BACKOFF_BASE_MS * 2 ** attempt;
      log(LogLevel.WARN, 'Leaderboard rate limited, backing off', {
        tournament_id: tournamentId,
        shape,
        attempt: attempt + 1,
        backoff_ms: backoffMs,
      });
      await this.sleep(backoffMs);
    }

    log(LogLevel.WARN, 'Leaderboard still rate limited, giving up', {
      tournament_id: tournamentId,
      shape,
    });
    return [];
  }
}
