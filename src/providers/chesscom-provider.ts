/**
 * Chess.com Provider
 *
 * ChessProvider implementation composed from the repository and services.
 * `createChessComProvider` wires the HTTP stack from configuration:
 * axios with session auth, transport retries, and the response cache
 * unless caching is turned off.
 */

import { EnvironmentConfig } from '../config/environment';
import { AxiosHttpClient, createAxiosInstance, HttpClient } from '../config/http-client';
import { applySessionAuth, CookieAuthProvider } from '../middleware/session-auth';
import { AuthProvider } from '../models/auth';
import { Club, Member } from '../models/club';
import { Game } from '../models/game';
import { PlayerProfile } from '../models/player';
import { ChessProvider, MemberQueryOptions } from '../models/provider';
import { Tournament, TournamentFormat, TournamentResult } from '../models/tournament';
import { CachingHttpClient } from '../repositories/caching-http-client';
import { ChessComRepository } from '../repositories/chesscom-repository';
import { ResponseCache } from '../repositories/response-cache';
import { ArchiveService } from '../services/archive-service';
import { ClubService } from '../services/club-service';
import { GameService } from '../services/game-service';
import { ParticipantService } from '../services/participant-service';
import { PlayerService } from '../services/player-service';
import { TournamentService } from '../services/tournament-service';
import { Sleep } from '../utils/sleep';

export interface ChessComServices {
  clubs: ClubService;
  players: PlayerService;
  tournaments: TournamentService;
  participants: ParticipantService;
  games: GameService;
}

export class ChessComProvider implements ChessProvider {
  constructor(private readonly services: ChessComServices) {}

  getClub(slug: string): Promise<Club> {
    return this.services.clubs.getClub(slug);
  }

  getClubMembers(slug: string, options?: MemberQueryOptions): Promise<Member[]> {
    return this.services.clubs.getClubMembers(slug, options);
  }

  getClubTournaments(slug: string): Promise<Tournament[]> {
    return this.services.clubs.getClubTournaments(slug);
  }

  getTournamentResults(
    tournamentId: string,
    format?: TournamentFormat
  ): Promise<TournamentResult[]> {
    return this.services.tournaments.getTournamentResults(tournamentId, format);
  }

  resolveParticipants(tournament: Tournament): Promise<Set<string>> {
    return this.services.participants.resolveParticipants(tournament);
  }

  getTournamentGames(tournament: Tournament): Promise<Game[]> {
    return this.services.games.getTournamentGames(tournament);
  }

  getClubGames(slug: string, lastN?: number): Promise<Game[]> {
    return this.services.games.getClubGames(slug, lastN);
  }

  getPlayer(username: string): Promise<PlayerProfile> {
    return this.services.players.getPlayer(username);
  }
}

export interface ProviderOverrides {
  auth?: AuthProvider;
  sleep?: Sleep;
  httpClient?: HttpClient;           // Replaces the axios transport
}

/**
 * Build the services on top of an HttpClient
 */
export function createChessComServices(
  http: HttpClient,
  config: EnvironmentConfig,
  sleep?: Sleep
): ChessComServices {
  const repository = new ChessComRepository(http, {
    apiBaseUrl: config.apiBaseUrl,
    webBaseUrl: config.webBaseUrl,
  });

  const clubs = new ClubService(repository, { requestDelayMs: config.requestDelayMs, sleep });
  const tournaments = new TournamentService(repository, { sleep });
  const participants = new ParticipantService(tournaments, clubs);
  const archives = new ArchiveService(repository, {
    endBufferSeconds: config.endBufferSeconds,
    requestDelayMs: config.requestDelayMs,
    sleep,
  });

  return {
    clubs,
    players: new PlayerService(repository),
    tournaments,
    participants,
    games: new GameService(participants, archives, clubs),
  };
}

/**
 * Create a provider from configuration
 */
export function createChessComProvider(
  config: EnvironmentConfig,
  overrides: ProviderOverrides = {}
): ChessComProvider {
  let transport = overrides.httpClient;
  if (!transport) {
    const auth =
      overrides.auth ??
      new CookieAuthProvider({
        environment: { accessToken: config.accessToken, phpsessid: config.phpsessid },
        configDir: config.configDir,
      });
    const instance = createAxiosInstance(config);
    applySessionAuth(instance, auth, config.webBaseUrl);
    transport = new AxiosHttpClient(instance, { sleep: overrides.sleep });
  }

  const http = config.cacheEnabled
    ? new CachingHttpClient(transport, new ResponseCache({ cacheDir: config.cacheDir }))
    : transport;

  return new ChessComProvider(createChessComServices(http, config, overrides.sleep));
}
