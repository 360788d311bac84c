/**
 * Participant Service
 *
 * Resolves the set of usernames who played in a tournament. The leaderboard
 * is authoritative. When it yields nobody for a tournament that reports
 * players, the owning club's current roster stands in.
 */

import { ClubService } from './club-service';
import { TournamentService } from './tournament-service';
import { NotFoundError, RateLimitedError } from '../models/errors';
import { Tournament } from '../models/tournament';
import { log, LogLevel } from '../utils/logger';

export type ParticipantSource = 'leaderboard' | 'club_roster' | 'none';

export interface ParticipantResolution {
  usernames: Set<string>;            // Lowercase
  source: ParticipantSource;
}

/**
 * Participant Service
 * Provides participant resolution with the club roster fallback
 */
export class ParticipantService {
  constructor(
    private readonly tournamentService: TournamentService,
    private readonly clubService: ClubService
  ) {}

  /**
   * Lowercase usernames of the tournament's players, or an empty set when
   * they cannot be determined
   *
   * @throws AuthenticationRequiredError from the leaderboard step
   */
  async resolveParticipants(tournament: Tournament): Promise<Set<string>> {
    return (await this.resolve(tournament)).usernames;
  }

  /**
   * Resolve participants and report which source supplied them
   */
  async resolve(tournament: Tournament): Promise<ParticipantResolution> {
    const results = await this.tournamentService.getTournamentResults(
      tournament.id,
      tournament.format
    );
    const fromLeaderboard = new Set(results.map((r) => r.player.toLowerCase()));
    if (fromLeaderboard.size > 0) {
      return this.resolved(tournament, fromLeaderboard, 'leaderboard');
    }

    if (tournament.playerCount > 0 && tournament.clubSlug) {
      // Best-effort approximation: players must be club members, but the
      // roster also holds members who did not play.
      const fromRoster = await this.rosterUsernames(tournament.clubSlug);
      if (fromRoster.size > 0) {
        return this.resolved(tournament, fromRoster, 'club_roster');
      }
    }

    return this.resolved(tournament, new Set(), 'none');
  }

  private async rosterUsernames(clubSlug: string): Promise<Set<string>> {
    try {
      const members = await this.clubService.getClubMembers(clubSlug);
      return new Set(members.map((m) => m.username.toLowerCase()));
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof RateLimitedError) {
        log(LogLevel.WARN, 'Club roster unavailable for participant fallback', {
          club: clubSlug,
          error: error.message,
        });
        return new Set();
      }
      throw error;
    }
  }

  private resolved(
    tournament: Tournament,
    usernames: Set<string>,
    source: ParticipantSource
  ): ParticipantResolution {
    log(LogLevel.INFO, 'Participants resolved', {
      tournament_id: tournament.id,
      source,
      count: usernames.size,
    });
    return { usernames, source };
  }
}
