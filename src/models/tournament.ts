/**
 * Tournament Models
 *
 * Type definitions for club-organised tournaments and their standings.
 * Tournaments come from the internal web API, which lists Swiss events
 * under `live_tournament` and arenas under `arena`.
 */

/**
 * Tournament pairing formats. They use different leaderboard URL shapes.
 */
export enum TournamentFormat {
  SWISS = 'swiss',
  ARENA = 'arena',
}

/**
 * Tournament entity
 */
export interface Tournament {
  id: string;                        // Opaque platform id
  name: string;
  format: TournamentFormat;
  status: string;                    // Past-tournament list only holds 'finished'
  startDate: number | null;          // Unix seconds
  endDate: number | null;            // Unix seconds
  playerCount: number;
  winnerUsername: string | null;
  winnerScore: number | null;
  clubSlug: string | null;           // Owning club, fallback participant source
}

/**
 * A player's final standing in a tournament
 */
export interface TournamentResult {
  tournamentId: string;
  player: string;
  position: number;                  // Ascending = better
  score: number | null;
  rating: number | null;             // Rating at the time of the event
}

/**
 * Tournament entry from the club's past-tournaments page
 */
export interface TournamentPayload {
  id: number | string;
  name?: string;
  start_time?: number | null;
  end_time?: number | null;
  registered_user_count?: number | null;
  winner?: {
    username?: string | null;
    score?: number | null;
  } | null;
}

/**
 * One page of the club's past tournaments
 */
export interface TournamentPagePayload {
  live_tournament?: TournamentPayload[];
  arena?: TournamentPayload[];
}

/**
 * Leaderboard entry
 */
export interface LeaderboardPlayerPayload {
  username: string;
  rank?: number | string | null;
  score?: number | null;
  rating?: number | null;
}

/**
 * Leaderboard payload (both URL shapes answer with the same body)
 */
export interface LeaderboardPayload {
  players?: LeaderboardPlayerPayload[];
}

/**
 * Convert a past-tournament entry to Tournament model
 */
export function mapTournamentPayload(
  payload: TournamentPayload,
  format: TournamentFormat,
  clubSlug: string | null
): Tournament {
  return {
    id: String(payload.id),
    name: payload.name ?? '',
    format,
    status: 'finished',
    startDate: payload.start_time ?? null,
    endDate: payload.end_time ?? null,
    playerCount: payload.registered_user_count ?? 0,
    winnerUsername: payload.winner?.username ?? null,
    winnerScore: payload.winner?.score ?? null,
    clubSlug,
  };
}

/**
 * Convert a page of past tournaments, Swiss events first
 */
export function mapTournamentPagePayload(
  payload: TournamentPagePayload,
  clubSlug: string | null
): Tournament[] {
  return [
    ...(payload.live_tournament ?? []).map((t) =>
      mapTournamentPayload(t, TournamentFormat.SWISS, clubSlug)
    ),
    ...(payload.arena ?? []).map((t) =>
      mapTournamentPayload(t, TournamentFormat.ARENA, clubSlug)
    ),
  ];
}

/**
 * Convert leaderboard entry to TournamentResult model
 */
export function mapLeaderboardPlayer(
  payload: LeaderboardPlayerPayload,
  tournamentId: string
): TournamentResult {
  const position = Number(payload.rank ?? 0);
  return {
    tournamentId,
    player: payload.username,
    position: Number.isFinite(position) ? Math.trunc(position) : 0,
    score: payload.score ?? null,
    rating: payload.rating ?? null,
  };
}
