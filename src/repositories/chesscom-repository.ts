/**
 * Chess.com Repository
 *
 * Data access layer for the public API (`/pub`) and the session-authenticated
 * web API (`/callback`). Each method issues GETs through the injected
 * HttpClient, interprets the status and maps the validated body to domain
 * models.
 *
 * Status handling:
 * - 200 -> payload
 * - 401 -> AuthenticationRequiredError
 * - 404 -> NotFoundError, or a `not_found` lookup where absence is expected
 * - 429 -> RateLimitedError, or a `rate_limited` lookup where callers degrade
 * - other -> UpstreamHttpError, unmodified
 */

import { HttpClient, HttpResponse } from '../config/http-client';
import { AUTH_SETUP_HINT } from '../middleware/session-auth';
import { Club, mapClubPayload, mapMembersPayload, Member } from '../models/club';
import {
  AuthenticationRequiredError,
  NotFoundError,
  RateLimitedError,
  UpstreamHttpError,
  UpstreamPayloadError,
} from '../models/errors';
import { ArchivedGamePayload } from '../models/game';
import { mapPlayerPayload, PlayerProfile } from '../models/player';
import {
  mapLeaderboardPlayer,
  mapTournamentPagePayload,
  Tournament,
  TournamentFormat,
  TournamentResult,
} from '../models/tournament';
import { log, LogLevel } from '../utils/logger';
import {
  parseArchivePayload,
  parseClubPayload,
  parseLeaderboardPayload,
  parseMembersPayload,
  parsePlayerPayload,
  parseTournamentPagePayload,
} from '../utils/payload-validation';

/**
 * Lookup outcome for endpoints where absence and throttling are expected
 */
export type UpstreamLookup<T> =
  | { status: 'found'; value: T; cached: boolean }
  | { status: 'not_found' }
  | { status: 'rate_limited' };

export interface ChessComEndpoints {
  apiBaseUrl: string;                // e.g. https://api.chess.com/pub
  webBaseUrl: string;                // e.g. https://www.chess.com
}

/**
 * Upper bound on past-tournament pages, in case upstream never returns an
 * empty page
 */
const MAX_TOURNAMENT_PAGES = 200;

/**
 * Chess.com Repository
 * Provides typed access to the upstream endpoints
 */
export class ChessComRepository {
  constructor(
    private readonly http: HttpClient,
    private readonly endpoints: ChessComEndpoints
  ) {}

  clubUrl(slug: string): string {
    return `${this.endpoints.apiBaseUrl}/club/${encodeURIComponent(slug)}`;
  }

  clubMembersUrl(slug: string): string {
    return `${this.clubUrl(slug)}/members`;
  }

  clubTournamentsUrl(clubId: string): string {
    return `${this.endpoints.webBaseUrl}/callback/clubs/live/past/${encodeURIComponent(clubId)}`;
  }

  /**
   * Swiss and arena events expose their standings under different paths
   */
  leaderboardUrl(tournamentId: string, format: TournamentFormat): string {
    const id = encodeURIComponent(tournamentId);
    return format === TournamentFormat.SWISS
      ? `${this.endpoints.webBaseUrl}/callback/live-tournament/${id}/leaderboard`
      : `${this.endpoints.webBaseUrl}/callback/live/tournament/${id}/leaderboard`;
  }

  playerUrl(username: string): string {
    return `${this.endpoints.apiBaseUrl}/player/${encodeURIComponent(username)}`;
  }

  archiveUrl(username: string, year: number, month: number): string {
    const mm = String(month).padStart(2, '0');
    return `${this.playerUrl(username)}/games/${year}/${mm}`;
  }

  /**
   * Find club info by slug
   *
   * @throws NotFoundError if the club does not exist
   */
  async findClub(slug: string): Promise<Club> {
    const url = this.clubUrl(slug);
    const body = expectOk(await this.http.get(url), url, `Club "${slug}"`);
    return mapClubPayload(slug, parseClubPayload(body));
  }

  /**
   * Find the full roster, all activity tiers flattened
   *
   * @throws NotFoundError if the club does not exist
   */
  async findClubMembers(slug: string): Promise<Member[]> {
    const url = this.clubMembersUrl(slug);
    const body = expectOk(await this.http.get(url), url, `Club "${slug}"`);
    return mapMembersPayload(parseMembersPayload(body));
  }

  /**
   * Find every past tournament of a club, following pagination until an
   * empty page
   *
   * @param club - Club with its platform id
   * @throws AuthenticationRequiredError when the session is missing or rejected
   */
  async findClubTournaments(club: Club): Promise<Tournament[]> {
    if (!club.providerId) {
      throw new UpstreamPayloadError(`Club "${club.id}" has no platform id`);
    }

    const url = this.clubTournamentsUrl(club.providerId);
    const tournaments: Tournament[] = [];

    for (let page = 1; page <= MAX_TOURNAMENT_PAGES; page++) {
      const body = expectOk(
        await this.http.get(url, { page }),
        url,
        `Tournaments of club "${club.id}"`
      );
      const pageItems = mapTournamentPagePayload(parseTournamentPagePayload(body), club.id);
      if (pageItems.length === 0) {
        return tournaments;
      }
      tournaments.push(...pageItems);
    }

    log(LogLevel.WARN, 'Stopped paginating club tournaments at page limit', {
      club: club.id,
      pages: MAX_TOURNAMENT_PAGES,
    });
    return tournaments;
  }

  /**
   * Look up the standings under one leaderboard URL shape
   *
   * @throws AuthenticationRequiredError on 401
   */
  async findLeaderboard(
    tournamentId: string,
    format: TournamentFormat
  ): Promise<UpstreamLookup<TournamentResult[]>> {
    const url = this.leaderboardUrl(tournamentId, format);
    const response = await this.http.get(url);

    if (response.status === 404) {
      return { status: 'not_found' };
    }
    if (response.status === 429) {
      return { status: 'rate_limited' };
    }

    const body = expectOk(response, url, `Leaderboard of tournament ${tournamentId}`);
    const payload = parseLeaderboardPayload(body);
    return {
      status: 'found',
      value: (payload.players ?? []).map((p) => mapLeaderboardPlayer(p, tournamentId)),
      cached: response.cached === true,
    };
  }

  /**
   * Look up one player's games for a calendar month
   *
   * A 404 means the player has no archive for that month. Games failing
   * validation are dropped with a WARN entry; the rest are returned.
   */
  async findPlayerArchive(
    username: string,
    year: number,
    month: number
  ): Promise<UpstreamLookup<ArchivedGamePayload[]>> {
    const url = this.archiveUrl(username, year, month);
    const response = await this.http.get(url);

    if (response.status === 404) {
      return { status: 'not_found' };
    }
    if (response.status === 429) {
      return { status: 'rate_limited' };
    }

    const body = expectOk(response, url, `Archive ${year}/${month} of "${username}"`);
    const { games, rejected } = parseArchivePayload(body);
    for (const game of rejected) {
      log(LogLevel.WARN, 'Dropped malformed archived game', {
        url,
        index: game.index,
        details: game.details,
      });
    }
    return {
      status: 'found',
      value: games,
      cached: response.cached === true,
    };
  }

  /**
   * Find a player profile
   *
   * @throws NotFoundError if the player does not exist
   */
  async findPlayer(username: string): Promise<PlayerProfile> {
    const url = this.playerUrl(username);
    const body = expectOk(await this.http.get(url), url, `Player "${username}"`);
    return mapPlayerPayload(parsePlayerPayload(body));
  }
}

/**
 * Return the body of a 200 response or throw the matching error
 */
function expectOk(response: HttpResponse, url: string, resource: string): unknown {
  switch (response.status) {
    case 200:
      return response.body;
    case 401:
      throw new AuthenticationRequiredError(
        `This endpoint requires authentication. ${AUTH_SETUP_HINT}`
      );
    case 404:
      throw new NotFoundError(`${resource} not found`);
    case 429:
      throw new RateLimitedError(`Rate limited while fetching ${resource}`, url);
    default:
      throw new UpstreamHttpError(response.status, url);
  }
}
