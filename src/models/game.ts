/**
 * Game Models
 *
 * Type definitions for games reconstructed from monthly player archives.
 */

/**
 * Game result values
 */
export enum GameResult {
  WHITE_WINS = '1-0',
  BLACK_WINS = '0-1',
  DRAW = '1/2-1/2',
}

/**
 * Game entity
 */
export interface Game {
  white: string;
  black: string;
  result: GameResult;
  openingEco: string | null;
  pgn: string | null;
  playedAt: number | null;           // Unix seconds (archive end_time)
  whiteAccuracy: number | null;      // 0-100, present when a review was run
  blackAccuracy: number | null;
  tournamentId: string | null;
  url: string | null;
}

/**
 * One side of an archived game
 */
export interface GameSidePayload {
  username?: string;
  rating?: number;
  result?: string;
}

/**
 * Archived game as listed by /player/{u}/games/{yyyy}/{mm}
 */
export interface ArchivedGamePayload {
  url?: string;
  pgn?: string;
  eco?: string;
  end_time?: number;
  white?: GameSidePayload;
  black?: GameSidePayload;
  accuracies?: {
    white?: number | null;
    black?: number | null;
  };
}

/**
 * Derive the result string from the per-side outcome
 *
 * Only `win` is decisive; every other outcome (agreed, repetition,
 * stalemate, timevsinsufficient...) counts as a draw.
 */
export function mapGameResult(payload: ArchivedGamePayload): GameResult {
  if (payload.white?.result === 'win') {
    return GameResult.WHITE_WINS;
  }
  if (payload.black?.result === 'win') {
    return GameResult.BLACK_WINS;
  }
  return GameResult.DRAW;
}

/**
 * Convert archived game to Game model
 */
export function mapArchivedGame(
  payload: ArchivedGamePayload,
  tournamentId: string | null
): Game {
  return {
    white: payload.white?.username ?? '',
    black: payload.black?.username ?? '',
    result: mapGameResult(payload),
    openingEco: payload.eco ?? null,
    pgn: payload.pgn ?? null,
    playedAt: payload.end_time ?? null,
    whiteAccuracy: payload.accuracies?.white ?? null,
    blackAccuracy: payload.accuracies?.black ?? null,
    tournamentId,
    url: payload.url ?? null,
  };
}
