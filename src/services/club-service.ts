/**
 * Club Service
 *
 * Business logic layer for club operations: club info, rosters (optionally
 * enriched with player titles) and the club's past tournaments.
 */

import { ChessComRepository } from '../repositories/chesscom-repository';
import { Club, Member } from '../models/club';
import {
  NotFoundError,
  RateLimitedError,
  UpstreamHttpError,
  UpstreamPayloadError,
} from '../models/errors';
import { MemberQueryOptions } from '../models/provider';
import { Tournament } from '../models/tournament';
import { log, LogLevel } from '../utils/logger';
import { sleep as defaultSleep, Sleep } from '../utils/sleep';

export interface ClubServiceOptions {
  requestDelayMs: number;
  sleep?: Sleep;
}

/**
 * Club Service
 * Provides business logic for club operations
 */
export class ClubService {
  private readonly sleep: Sleep;

  constructor(
    private readonly repository: ChessComRepository,
    private readonly options: ClubServiceOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getClub(slug: string): Promise<Club> {
    return this.repository.findClub(slug);
  }

  /**
   * Get the club roster
   *
   * With `withDetails`, each member's profile is fetched to fill in the
   * title, pausing between requests. A profile that cannot be fetched leaves
   * the title null.
   *
   * @param slug - Club slug
   * @param options - Roster options
   * @returns Members in weekly, monthly, all_time order
   */
  async getClubMembers(slug: string, options: MemberQueryOptions = {}): Promise<Member[]> {
    const members = await this.repository.findClubMembers(slug);
    if (!options.withDetails) {
      return members;
    }

    const detailed: Member[] = [];
    for (const member of members) {
      detailed.push({ ...member, title: await this.fetchTitle(member.username) });
      await this.sleep(this.options.requestDelayMs);
    }
    return detailed;
  }

  /**
   * Get every past tournament organised by the club
   *
   * Requires session credentials: the list lives on the web API.
   */
  async getClubTournaments(slug: string): Promise<Tournament[]> {
    const club = await this.repository.findClub(slug);
    return this.repository.findClubTournaments(club);
  }

  private async fetchTitle(username: string): Promise<string | null> {
    try {
      return (await this.repository.findPlayer(username)).title;
    } catch (error) {
      if (
        error instanceof NotFoundError ||
        error instanceof RateLimitedError ||
        error instanceof UpstreamHttpError ||
        error instanceof UpstreamPayloadError
      ) {
        log(LogLevel.WARN, 'Skipping member profile', {
          username,
          error: error.message,
        });
        return null;
      }
      throw error;
    }
  }
}
