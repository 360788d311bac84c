/**
 * Game Service
 *
 * Business logic layer for tournament game reconstruction. Participants are
 * resolved, their archives scanned over the tournament window, and the
 * result deduplicated and ranked by accuracy. Club-wide queries repeat this
 * for the club's most recent tournaments and merge the results.
 */

import { ArchiveService } from './archive-service';
import { ClubService } from './club-service';
import { ParticipantService } from './participant-service';
import { Game } from '../models/game';
import { Tournament } from '../models/tournament';
import { dedupeGames, gamePlayersKey, rankGames } from '../utils/game-ranking';
import { log, LogLevel } from '../utils/logger';

/**
 * Newest tournaments first by end date, undated ones last, limited to lastN
 *
 * @param tournaments - Tournaments in upstream order
 * @param lastN - How many to keep; all when omitted
 */
export function selectRecentTournaments(tournaments: Tournament[], lastN?: number): Tournament[] {
  const sorted = [...tournaments].sort((a, b) => (b.endDate ?? 0) - (a.endDate ?? 0));
  return lastN === undefined ? sorted : sorted.slice(0, Math.max(0, lastN));
}

/**
 * Game Service
 * Provides tournament and club game reconstruction
 */
export class GameService {
  constructor(
    private readonly participantService: ParticipantService,
    private readonly archiveService: ArchiveService,
    private readonly clubService: ClubService
  ) {}

  /**
   * Games played in one tournament, best accuracy first
   *
   * A tournament missing either date yields no games and makes no requests.
   *
   * @throws AuthenticationRequiredError if the leaderboard needs a session
   */
  async getTournamentGames(tournament: Tournament): Promise<Game[]> {
    if (tournament.startDate === null || tournament.endDate === null) {
      log(LogLevel.INFO, 'Tournament has no time window, skipping', {
        tournament_id: tournament.id,
      });
      return [];
    }

    const participants = await this.participantService.resolveParticipants(tournament);
    if (participants.size === 0) {
      return [];
    }

    const games = await this.archiveService.scanTournament(tournament, participants);
    return rankGames(dedupeGames(games));
  }

  /**
   * Games from the club's most recent tournaments, merged and ranked
   *
   * Tournaments are processed one at a time. Games found through more than
   * one tournament are kept once, keyed on players and time.
   */
  async getClubGames(slug: string, lastN?: number): Promise<Game[]> {
    const tournaments = await this.clubService.getClubTournaments(slug);
    const selected = selectRecentTournaments(tournaments, lastN);

    const all: Game[] = [];
    for (const tournament of selected) {
      all.push(...(await this.getTournamentGames(tournament)));
    }

    const merged = rankGames(dedupeGames(all, gamePlayersKey));
    log(LogLevel.INFO, 'Club games collected', {
      club: slug,
      tournaments: selected.length,
      games: merged.length,
    });
    return merged;
  }
}
