#!/usr/bin/env node

/**
 * clubscan CLI
 *
 * Entry point of the `clubscan` binary. Configuration comes from the
 * environment (see config/environment); command output goes to stdout,
 * log entries and errors to stderr.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadEnvironmentConfig, validateEnvironmentConfig } from './config/environment';
import {
  authClear,
  authSetup,
  authStatus,
  cacheClear,
  cacheStats,
  CliContext,
  DEFAULT_LAST_N,
  clubGames,
  clubInfo,
  clubMembers,
  clubTournamentGames,
  clubTournaments,
  parseAccuracy,
  parseNonNegativeInt,
  parseTournamentFormat,
  playerProfile,
  tournamentResults,
} from './handlers/cli-handler';
import { handleCliError } from './middleware/error-handler';
import { CookieAuthProvider } from './middleware/session-auth';
import { TournamentFormat } from './models/tournament';
import { createChessComProvider } from './providers/chesscom-provider';
import { ResponseCache } from './repositories/response-cache';
import { configureLogger, log, LogLevel } from './utils/logger';
import { generateRunId, OutputFormat, parseOutputFormat } from './utils/output-formatter';

interface GlobalOptions {
  output: OutputFormat;
}

/**
 * Adapt a parser to commander, reporting failures as invalid arguments
 */
function optionParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

const program = new Command()
  .name('clubscan')
  .description('Inspect chess clubs, their tournaments and the games played in them')
  .version('0.1.0')
  .option(
    '-o, --output <format>',
    'output format: json or csv',
    optionParser(parseOutputFormat),
    OutputFormat.JSON
  );

function createContext(): CliContext {
  const config = loadEnvironmentConfig();
  validateEnvironmentConfig(config);

  const runId = generateRunId();
  configureLogger({ level: config.logLevel, runId });
  log(LogLevel.DEBUG, 'Starting command', {
    cache_enabled: config.cacheEnabled,
    cache_dir: config.cacheDir,
  });

  const auth = new CookieAuthProvider({
    environment: { accessToken: config.accessToken, phpsessid: config.phpsessid },
    configDir: config.configDir,
  });

  return {
    provider: createChessComProvider(config, { auth }),
    cache: new ResponseCache({ cacheDir: config.cacheDir }),
    auth,
    configDir: config.configDir,
    output: program.opts<GlobalOptions>().output,
  };
}

/**
 * Run a command, print its output, and map failures to an exit code
 */
async function run(command: (ctx: CliContext) => Promise<string> | string): Promise<void> {
  try {
    const output = await command(createContext());
    if (output) {
      console.log(output);
    }
  } catch (error) {
    const { exitCode, message } = handleCliError(error);
    console.error(message);
    process.exitCode = exitCode;
  }
}

// ─── club ────────────────────────────────────────────────────────────────────

const club = program.command('club').description('Club information, rosters and games');

club
  .command('info <slug>')
  .description('Show club details')
  .action((slug: string) => run((ctx) => clubInfo(ctx, slug)));

club
  .command('members <slug>')
  .description('List club members')
  .option('--details', 'fetch each profile to fill in titles (slow)')
  .action((slug: string, opts: { details?: boolean }) =>
    run((ctx) => clubMembers(ctx, slug, opts))
  );

club
  .command('tournaments <slug>')
  .description('List past club tournaments, oldest first (requires auth)')
  .option('--details', 'include per-player standings of each tournament (JSON only)')
  .option(
    '-g, --games <selector>',
    'show the games of one tournament: its # in the list, a partial name or its id'
  )
  .action((slug: string, opts: { details?: boolean; games?: string }) =>
    run((ctx) => clubTournaments(ctx, slug, opts))
  );

club
  .command('games <slug>')
  .description('Games from recent club tournaments, best accuracy first (requires auth)')
  .option(
    '--last-n <n>',
    `only the n most recent tournaments, 0 for all (default ${DEFAULT_LAST_N})`,
    optionParser(parseNonNegativeInt)
  )
  .option(
    '--min-accuracy <pct>',
    'only games whose average accuracy reaches pct; above 0 also drops unscored games',
    optionParser(parseAccuracy)
  )
  .action((slug: string, opts: { lastN?: number; minAccuracy?: number }) =>
    run((ctx) => clubGames(ctx, slug, opts))
  );

club
  .command('tournament-games <slug> <tournament>')
  .description('Games of one club tournament by #, partial name or id (requires auth)')
  .action((slug: string, selector: string) =>
    run((ctx) => clubTournamentGames(ctx, slug, selector))
  );

// ─── tournament ──────────────────────────────────────────────────────────────

const tournament = program.command('tournament').description('Tournament standings');

tournament
  .command('results <id>')
  .description('Final standings of a tournament (requires auth)')
  .option(
    '--type <format>',
    'swiss or arena, decides which leaderboard is tried first',
    optionParser(parseTournamentFormat)
  )
  .action((id: string, opts: { type?: TournamentFormat }) =>
    run((ctx) => tournamentResults(ctx, id, opts))
  );

// ─── player ──────────────────────────────────────────────────────────────────

program
  .command('player <username>')
  .description('Show a player profile')
  .action((username: string) => run((ctx) => playerProfile(ctx, username)));

// ─── cache ───────────────────────────────────────────────────────────────────

const cache = program.command('cache').description('Response cache maintenance');

cache
  .command('stats')
  .description('Count cache entries and their size')
  .action(() => run((ctx) => cacheStats(ctx)));

cache
  .command('clear')
  .description('Delete cached responses')
  .option('--expired', 'only delete expired entries')
  .action((opts: { expired?: boolean }) => run((ctx) => cacheClear(ctx, opts)));

// ─── auth ────────────────────────────────────────────────────────────────────

const auth = program.command('auth').description('Session credentials for the web API');

auth
  .command('status')
  .description('Show where credentials are resolved from')
  .action(() => run((ctx) => authStatus(ctx)));

auth
  .command('setup')
  .description('Store ACCESS_TOKEN and PHPSESSID cookie values')
  .requiredOption('--access-token <token>', 'ACCESS_TOKEN cookie value')
  .requiredOption('--phpsessid <id>', 'PHPSESSID cookie value')
  .action((opts: { accessToken: string; phpsessid: string }) =>
    run((ctx) => authSetup(ctx, opts.accessToken, opts.phpsessid))
  );

auth
  .command('clear')
  .description('Remove stored credentials')
  .action(() => run((ctx) => authClear(ctx)));

program.parseAsync(process.argv).catch((error: unknown) => {
  const { exitCode, message } = handleCliError(error);
  console.error(message);
  process.exitCode = exitCode;
});
