/**
 * Chess Provider Interface
 *
 * Capability interface for a chess platform. The CLI depends only on this
 * contract; each upstream platform supplies one implementation.
 */

import { Club, Member } from './club';
import { Game } from './game';
import { PlayerProfile } from './player';
import { Tournament, TournamentFormat, TournamentResult } from './tournament';

/**
 * Options for roster retrieval
 */
export interface MemberQueryOptions {
  withDetails?: boolean;             // Fetch each profile to fill in titles
}

export interface ChessProvider {
  getClub(slug: string): Promise<Club>;
  getClubMembers(slug: string, options?: MemberQueryOptions): Promise<Member[]>;
  getClubTournaments(slug: string): Promise<Tournament[]>;
  getTournamentResults(
    tournamentId: string,
    format?: TournamentFormat
  ): Promise<TournamentResult[]>;
  resolveParticipants(tournament: Tournament): Promise<Set<string>>;
  getTournamentGames(tournament: Tournament): Promise<Game[]>;
  getClubGames(slug: string, lastN?: number): Promise<Game[]>;
  getPlayer(username: string): Promise<PlayerProfile>;
}
