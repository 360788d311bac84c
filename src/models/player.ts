/**
 * Player Models
 */

/**
 * Public player profile
 */
export interface PlayerProfile {
  username: string;
  playerId: number | null;
  title: string | null;
  name: string | null;
  country: string | null;
  followers: number | null;
  joined: number | null;
  lastOnline: number | null;
  status: string | null;
  url: string | null;
}

/**
 * Profile payload from /pub/player/{username}
 */
export interface PlayerPayload {
  username: string;
  player_id?: number;
  title?: string;
  name?: string;
  country?: string;
  followers?: number;
  joined?: number;
  last_online?: number;
  status?: string;
  url?: string;
}

/**
 * Convert profile payload to PlayerProfile model
 */
export function mapPlayerPayload(payload: PlayerPayload): PlayerProfile {
  return {
    username: payload.username,
    playerId: payload.player_id ?? null,
    title: payload.title ?? null,
    name: payload.name ?? null,
    country: payload.country ?? null,
    followers: payload.followers ?? null,
    joined: payload.joined ?? null,
    lastOnline: payload.last_online ?? null,
    status: payload.status ?? null,
    url: payload.url ?? null,
  };
}
