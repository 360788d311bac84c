/**
 * CLI Command Handlers
 *
 * One function per `clubscan` command. Each receives the command context
 * and resolves to the text written to stdout, so commands can be exercised
 * without a process or a terminal.
 */

import { credentialsPath, clearStoredCredentials, saveStoredCredentials } from '../config/credentials';
import { AuthProvider } from '../models/auth';
import { AuthenticationRequiredError, NotFoundError } from '../models/errors';
import { Game } from '../models/game';
import { ChessProvider } from '../models/provider';
import { Tournament, TournamentFormat, TournamentResult } from '../models/tournament';
import { ResponseCache } from '../repositories/response-cache';
import { averageAccuracy } from '../utils/game-ranking';
import { log, LogLevel } from '../utils/logger';
import { formatJson, formatRecords, OutputFormat, OutputRecord } from '../utils/output-formatter';

/**
 * Tournaments scanned by `club games` unless --last-n says otherwise
 */
export const DEFAULT_LAST_N = 5;

export interface CliContext {
  provider: ChessProvider;
  cache: ResponseCache;
  auth: AuthProvider;
  configDir: string;
  output: OutputFormat;
}

/**
 * Parse a --type value
 *
 * @throws Error for anything but swiss or arena
 */
export function parseTournamentFormat(value: string): TournamentFormat {
  const match = Object.values(TournamentFormat).find((format) => format === value.toLowerCase());
  if (!match) {
    throw new Error(`Unsupported tournament type "${value}", expected swiss or arena`);
  }
  return match;
}

/**
 * Parse a count option where 0 means "no limit", such as --last-n
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse an accuracy percentage such as --min-accuracy
 */
export function parseAccuracy(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(`Expected an accuracy between 0 and 100, got "${value}"`);
  }
  return parsed;
}

/**
 * Oldest first by end date, undated first; the order `--games <#>` counts in
 */
export function sortTournamentsForListing(tournaments: Tournament[]): Tournament[] {
  return [...tournaments].sort((a, b) => (a.endDate ?? 0) - (b.endDate ?? 0));
}

/**
 * Pick one tournament by list number, exact id or partial name
 *
 * Selector rules, first match wins:
 * 1. a number from 1 to the list length is a position in the listing order
 * 2. an exact tournament id
 * 3. a case-insensitive substring of the name; with several matches the
 *    most recent one is used
 *
 * @returns undefined when nothing matches
 */
export function selectTournament(
  tournaments: Tournament[],
  selector: string
): Tournament | undefined {
  const listed = sortTournamentsForListing(tournaments);
  const query = selector.trim();

  if (/^\d+$/.test(query)) {
    const position = Number(query);
    if (position >= 1 && position <= listed.length) {
      return listed[position - 1];
    }
  }

  const byId = listed.find((t) => t.id === query);
  if (byId) {
    return byId;
  }

  const needle = query.toLowerCase();
  const byName = needle
    ? listed.filter((t) => t.name.toLowerCase().includes(needle)).reverse()
    : [];
  if (byName.length > 1) {
    log(LogLevel.WARN, 'Several tournaments matched, using the most recent', {
      selector: query,
      matches: byName.length,
      tournament_id: byName[0].id,
      tournament_name: byName[0].name,
    });
  }
  return byName[0];
}

/**
 * Keep games whose average accuracy reaches the minimum
 *
 * A minimum above 0 also drops games without accuracy data.
 */
export function filterByMinAccuracy(games: Game[], minAccuracy: number): Game[] {
  if (minAccuracy <= 0) {
    return games;
  }
  return games.filter((game) => {
    const average = averageAccuracy(game);
    return average !== null && average >= minAccuracy;
  });
}

function render(ctx: CliContext, value: OutputRecord | OutputRecord[]): string {
  const records = Array.isArray(value) ? value : [value];
  return ctx.output === OutputFormat.CSV
    ? formatRecords(records, OutputFormat.CSV)
    : formatJson(value);
}

// Club commands

export async function clubInfo(ctx: CliContext, slug: string): Promise<string> {
  return render(ctx, await ctx.provider.getClub(slug));
}

export async function clubMembers(
  ctx: CliContext,
  slug: string,
  options: { details?: boolean } = {}
): Promise<string> {
  const members = await ctx.provider.getClubMembers(slug, { withDetails: options.details });
  return render(ctx, members);
}

export async function clubTournaments(
  ctx: CliContext,
  slug: string,
  options: { details?: boolean; games?: string } = {}
): Promise<string> {
  if (options.games !== undefined) {
    return clubTournamentGames(ctx, slug, options.games);
  }

  const tournaments = sortTournamentsForListing(await ctx.provider.getClubTournaments(slug));
  if (!options.details) {
    return render(ctx, tournaments);
  }
  if (ctx.output === OutputFormat.CSV) {
    log(LogLevel.WARN, 'Standings are not available as CSV, listing tournaments only');
    return render(ctx, tournaments);
  }

  const detailed: Array<Tournament & { results: TournamentResult[] }> = [];
  for (const tournament of tournaments) {
    detailed.push({ ...tournament, results: await standingsOf(ctx, tournament) });
  }
  return render(ctx, detailed);
}

async function standingsOf(ctx: CliContext, tournament: Tournament): Promise<TournamentResult[]> {
  try {
    return await ctx.provider.getTournamentResults(tournament.id, tournament.format);
  } catch (error) {
    if (!(error instanceof AuthenticationRequiredError)) {
      throw error;
    }
    log(LogLevel.WARN, 'Could not fetch standings', {
      tournament_id: tournament.id,
      error: error.message,
    });
    return [];
  }
}

/**
 * Games from the club's recent tournaments
 *
 * `lastN` defaults to DEFAULT_LAST_N; 0 scans every tournament.
 */
export async function clubGames(
  ctx: CliContext,
  slug: string,
  options: { lastN?: number; minAccuracy?: number } = {}
): Promise<string> {
  const lastN = options.lastN ?? DEFAULT_LAST_N;
  const games = await ctx.provider.getClubGames(slug, lastN > 0 ? lastN : undefined);
  return render(ctx, filterByMinAccuracy(games, options.minAccuracy ?? 0));
}

/**
 * Games of one club tournament
 *
 * @param selector - List number, exact id or partial name (see selectTournament)
 * @throws NotFoundError when no tournament of the club matches
 */
export async function clubTournamentGames(
  ctx: CliContext,
  slug: string,
  selector: string
): Promise<string> {
  const tournament = selectTournament(await ctx.provider.getClubTournaments(slug), selector);
  if (!tournament) {
    throw new NotFoundError(`Tournament ${selector} not found in club "${slug}"`);
  }
  log(LogLevel.INFO, 'Tournament selected', {
    tournament_id: tournament.id,
    tournament_name: tournament.name,
  });
  return render(ctx, await ctx.provider.getTournamentGames(tournament));
}

// Tournament and player commands

export async function tournamentResults(
  ctx: CliContext,
  tournamentId: string,
  options: { type?: TournamentFormat } = {}
): Promise<string> {
  return render(ctx, await ctx.provider.getTournamentResults(tournamentId, options.type));
}

export async function playerProfile(ctx: CliContext, username: string): Promise<string> {
  return render(ctx, await ctx.provider.getPlayer(username));
}

// Cache commands

export async function cacheStats(ctx: CliContext): Promise<string> {
  return render(ctx, await ctx.cache.stats());
}

export async function cacheClear(
  ctx: CliContext,
  options: { expired?: boolean } = {}
): Promise<string> {
  if (options.expired) {
    const removed = await ctx.cache.purgeExpired();
    return `Removed ${removed} expired cache entries`;
  }
  const removed = await ctx.cache.clear();
  return `Removed ${removed} cache entries`;
}

// Auth commands

export function authStatus(ctx: CliContext): string {
  return render(ctx, {
    authenticated: ctx.auth.isAuthenticated(),
    source: ctx.auth.credentialSource(),
    credentialsFile: credentialsPath(ctx.configDir),
  });
}

export function authSetup(ctx: CliContext, accessToken: string, phpsessid: string): string {
  if (!accessToken.trim() || !phpsessid.trim()) {
    throw new Error('Both --access-token and --phpsessid are required');
  }
  const file = saveStoredCredentials(ctx.configDir, accessToken.trim(), phpsessid.trim());
  return `Credentials saved to ${file}`;
}

export function authClear(ctx: CliContext): string {
  return clearStoredCredentials(ctx.configDir)
    ? `Removed ${credentialsPath(ctx.configDir)}`
    : 'No stored credentials to remove';
}
