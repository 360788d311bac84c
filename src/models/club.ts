/**
 * Club Models
 *
 * Type definitions for clubs and their member rosters.
 * Records are built fresh on every fetch and never persisted.
 */

/**
 * Activity tiers the members endpoint groups players by
 */
export enum MemberActivity {
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  ALL_TIME = 'all_time',
}

/**
 * Club entity
 */
export interface Club {
  id: string;                        // URL slug
  providerId: string | null;         // Platform numeric id, needed by the web API
  name: string;
  description: string | null;
  country: string | null;            // Country API URL
  url: string | null;
  membersCount: number | null;
  createdAt: number | null;          // Unix seconds
  location: string | null;
}

/**
 * Club member entity
 */
export interface Member {
  username: string;
  rating: number | null;
  title: string | null;
  joinedAt: number | null;           // Unix seconds
  activity: MemberActivity | null;
}

/**
 * Club payload from the public API
 */
export interface ClubPayload {
  club_id?: number;
  name?: string;
  description?: string | null;
  country?: string | null;
  url?: string | null;
  members_count?: number | null;
  created?: number | null;
  location?: string | null;
}

/**
 * Single roster entry from the public API
 */
export interface MemberPayload {
  username: string;
  joined?: number | null;
}

/**
 * Members payload from the public API, grouped by activity tier
 */
export interface MembersPayload {
  [MemberActivity.WEEKLY]?: MemberPayload[];
  [MemberActivity.MONTHLY]?: MemberPayload[];
  [MemberActivity.ALL_TIME]?: MemberPayload[];
}

/**
 * Convert club payload to Club model
 */
export function mapClubPayload(slug: string, payload: ClubPayload): Club {
  return {
    id: slug,
    providerId: payload.club_id ? String(payload.club_id) : null,
    name: payload.name ?? '',
    description: payload.description ?? null,
    country: payload.country ?? null,
    url: payload.url ?? null,
    membersCount: payload.members_count ?? null,
    createdAt: payload.created ?? null,
    location: payload.location ?? null,
  };
}

/**
 * Flatten the activity groups into a single roster
 *
 * Groups are read in weekly, monthly, all_time order. Rating and title are
 * not part of this payload and stay null until enriched from profiles.
 */
export function mapMembersPayload(payload: MembersPayload): Member[] {
  const members: Member[] = [];
  for (const activity of Object.values(MemberActivity)) {
    for (const entry of payload[activity] ?? []) {
      members.push({
        username: entry.username,
        rating: null,
        title: null,
        joinedAt: entry.joined ?? null,
        activity,
      });
    }
  }
  return members;
}
