/**
 * Archive Service
 *
 * Scans participants' monthly game archives for the games of one
 * tournament. A game is kept when it ended inside the tournament window and
 * both sides are participants. The same game shows up in both players'
 * archives and is kept once.
 */

import { ChessComRepository } from '../repositories/chesscom-repository';
import { Game, mapArchivedGame } from '../models/game';
import { Tournament } from '../models/tournament';
import { gameIdentityKey } from '../utils/game-ranking';
import { log, LogLevel } from '../utils/logger';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';
import { isWithinWindow, monthsInRange, tournamentWindow } from '../utils/time-window';

export interface ArchiveServiceOptions {
  endBufferSeconds: number;
  requestDelayMs: number;            // Pause after every network fetch
  sleep?: Sleep;
}

/**
 * Archive Service
 * Provides tournament game discovery from player archives
 */
export class ArchiveService {
  private readonly sleep: Sleep;

  constructor(
    private readonly repository: ChessComRepository,
    private readonly options: ArchiveServiceOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Find the games of a tournament in its participants' archives
   *
   * Participants are scanned in sorted order, months chronologically. A
   * missing or persistently rate-limited archive contributes no games.
   *
   * @param tournament - Tournament with both dates set
   * @param participants - Lowercase usernames
   * @returns Unique games in discovery order
   */
  async scanTournament(tournament: Tournament, participants: Set<string>): Promise<Game[]> {
    if (tournament.startDate === null || tournament.endDate === null || participants.size === 0) {
      return [];
    }

    const window = tournamentWindow(
      tournament.startDate,
      tournament.endDate,
      this.options.endBufferSeconds
    );
    const months = monthsInRange(window.start, window.end);

    const seen = new Set<string>();
    const games: Game[] = [];

    for (const username of [...participants].sort()) {
      for (const { year, month } of months) {
        const lookup = await this.repository.findPlayerArchive(username, year, month);

        if (lookup.status !== 'found' || !lookup.cached) {
          await this.pause();
        }
        if (lookup.status === 'not_found') {
          continue;
        }
        if (lookup.status === 'rate_limited') {
          log(LogLevel.WARN, 'Archive rate limited, skipping', { username, year, month });
          continue;
        }

        for (const raw of lookup.value) {
          if (raw.end_time === undefined || !isWithinWindow(raw.end_time, window)) {
            continue;
          }
          const white = (raw.white?.username ?? '').toLowerCase();
          const black = (raw.black?.username ?? '').toLowerCase();
          if (!participants.has(white) || !participants.has(black)) {
            continue;
          }

          const game = mapArchivedGame(raw, tournament.id);
          const key = gameIdentityKey(game);
          if (seen.has(key)) {
            continue;
          }
          seen.add(key);
          games.push(game);
        }
      }
    }

    log(LogLevel.INFO, 'Archive scan complete', {
      tournament_id: tournament.id,
      participants: participants.size,
      months: months.length,
      games: games.length,
    });
    return games;
  }

  private async pause(): Promise<void> {
    if (this.options.requestDelayMs > 0) {
      await this.sleep(this.options.requestDelayMs);
    }
  }
}
