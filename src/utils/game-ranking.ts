/**
 * Game Deduplication and Ranking Utilities
 *
 * Ranking Rules:
 * - average accuracy = mean of the per-side accuracies that are present
 * - games sort by average accuracy, best first
 * - games without any accuracy sort after every scored game
 * - ties keep their input order (the sort is stable)
 *
 * Identity Rules:
 * - a game's identity is its URL when present
 * - otherwise it is (white, black, played_at), usernames lowercased
 */

import { Game } from '../models/game';

/**
 * Sort value for unscored games, below the valid 0-100 range
 */
export const MISSING_ACCURACY_SENTINEL = -1;

/**
 * Mean of the non-null per-side accuracies, or null if neither side has one
 *
 * Examples:
 * - white 90, black 80 → 85
 * - white 70, black null → 70
 * - both null → null
 */
export function averageAccuracy(game: Game): number | null {
  const values = [game.whiteAccuracy, game.blackAccuracy].filter(
    (value): value is number => value !== null
  );
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Key on players and time only, ignoring the URL
 */
export function gamePlayersKey(game: Game): string {
  return `${game.white.toLowerCase()}:${game.black.toLowerCase()}:${game.playedAt ?? ''}`;
}

/**
 * Identity of a physical game: URL, else players and time
 */
export function gameIdentityKey(game: Game): string {
  return game.url ?? gamePlayersKey(game);
}

/**
 * Keep the first occurrence of every key, preserving order
 *
 * @param games - Games in discovery order
 * @param keyOf - Identity function, defaults to gameIdentityKey
 */
export function dedupeGames(
  games: Game[],
  keyOf: (game: Game) => string = gameIdentityKey
): Game[] {
  const seen = new Set<string>();
  const unique: Game[] = [];

  for (const game of games) {
    const key = keyOf(game);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(game);
  }

  return unique;
}

/**
 * Order games best-first by average accuracy, unscored last
 *
 * @returns A new array; the input is left untouched
 */
export function rankGames(games: Game[]): Game[] {
  const score = (game: Game) => averageAccuracy(game) ?? MISSING_ACCURACY_SENTINEL;
  return [...games].sort((a, b) => score(b) - score(a));
}
