/**
 * Response Cache Policy
 *
 * Decides how long a successful response may be cached, based only on the
 * shape of the request URL, and derives the canonical cache key for a
 * request.
 */

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const ARCHIVE_PAST_MONTH_TTL = 30 * DAY;
export const ARCHIVE_CURRENT_MONTH_TTL = HOUR;
export const PLAYER_PROFILE_TTL = DAY;
export const CLUB_MEMBERS_TTL = HOUR;
export const CLUB_INFO_TTL = DAY;
export const LEADERBOARD_TTL = 7 * DAY;
export const CLUB_TOURNAMENTS_TTL = 30 * MINUTE;

export type QueryParams = Record<string, string | number | boolean>;

/**
 * A TTL rule: the first rule whose `ttl` returns a number wins
 */
interface TtlRule {
  name: string;
  ttl(path: string, now: Date): number | null;
}

const ARCHIVE_PATTERN = /\/games\/(\d{4})\/(\d{2})$/;

const TTL_RULES: TtlRule[] = [
  {
    name: 'player-archive',
    ttl(path, now) {
      const match = ARCHIVE_PATTERN.exec(path);
      if (!match) {
        return null;
      }
      const year = parseInt(match[1], 10);
      const month = parseInt(match[2], 10);
      const currentYear = now.getUTCFullYear();
      const currentMonth = now.getUTCMonth() + 1;
      const isPast = year < currentYear || (year === currentYear && month < currentMonth);
      return isPast ? ARCHIVE_PAST_MONTH_TTL : ARCHIVE_CURRENT_MONTH_TTL;
    },
  },
  {
    name: 'player-profile',
    ttl: (path) => (/\/pub\/player\/[^/]+$/.test(path) ? PLAYER_PROFILE_TTL : null),
  },
  {
    name: 'club-members',
    ttl: (path) => (/\/pub\/club\/[^/]+\/members$/.test(path) ? CLUB_MEMBERS_TTL : null),
  },
  {
    name: 'club-info',
    ttl: (path) => (/\/pub\/club\/[^/]+$/.test(path) ? CLUB_INFO_TTL : null),
  },
  {
    name: 'tournament-leaderboard',
    ttl: (path) => (path.endsWith('/leaderboard') ? LEADERBOARD_TTL : null),
  },
  {
    name: 'club-tournament-list',
    ttl: (path) => (path.includes('/clubs/live/past/') ? CLUB_TOURNAMENTS_TTL : null),
  },
];

/**
 * Strip the query string and fragment so rules only see the path
 */
function urlPath(url: string): string {
  const cut = url.search(/[?#]/);
  return cut === -1 ? url : url.substring(0, cut);
}

/**
 * Return the TTL in seconds for a URL, or null when it must not be cached
 *
 * @param url - Full request URL
 * @param now - Reference time for the current-month archive rule
 */
export function resolveCacheTtl(url: string, now: Date = new Date()): number | null {
  const path = urlPath(url);
  for (const rule of TTL_RULES) {
    const ttl = rule.ttl(path, now);
    if (ttl !== null) {
      return ttl;
    }
  }
  return null;
}

/**
 * Build the canonical key for a request
 *
 * Parameters are serialized with sorted keys, so the same logical request
 * yields the same key whatever order its parameters were given in.
 *
 * @example
 * ```typescript
 * buildCacheKey('https://www.chess.com/callback/clubs/live/past/42', { page: 2 });
 * // 'https://www.chess.com/callback/clubs/live/past/42?{"page":2}'
 * ```
 */
export function buildCacheKey(url: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const sorted = Object.keys(params)
    .sort()
    .map((name) => `${JSON.stringify(name)}:${JSON.stringify(params[name])}`);
  return `${url}?{${sorted.join(',')}}`;
}
