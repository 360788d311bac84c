/**
 * Upstream Payload Validation
 *
 * Validates JSON bodies from the public and web APIs against JSON schemas
 * using ajv before they are mapped to domain models. Schemas only pin the
 * fields this client reads; upstream is free to add others.
 */

import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ClubPayload, MembersPayload } from '../models/club';
import { UpstreamPayloadError } from '../models/errors';
import { ArchivedGamePayload } from '../models/game';
import { PlayerPayload } from '../models/player';
import { LeaderboardPayload, TournamentPagePayload } from '../models/tournament';

// Initialize ajv in strict mode; union types cover nullable upstream fields
const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  coerceTypes: false,
});

// Add format validators (uri, etc.)
addFormats(ajv);

const nullableString = { type: ['string', 'null'] };
const nullableNumber = { type: ['number', 'null'] };

/**
 * Club info schema
 */
const clubSchema: SchemaObject = {
  type: 'object',
  properties: {
    club_id: { type: 'number' },
    name: { type: 'string' },
    description: nullableString,
    country: nullableString,
    url: { type: ['string', 'null'], format: 'uri' },
    members_count: nullableNumber,
    created: nullableNumber,
    location: nullableString,
  },
};

const memberListSchema = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      username: { type: 'string', minLength: 1 },
      joined: nullableNumber,
    },
    required: ['username'],
  },
};

/**
 * Club members schema, grouped by activity tier
 */
const membersSchema: SchemaObject = {
  type: 'object',
  properties: {
    weekly: memberListSchema,
    monthly: memberListSchema,
    all_time: memberListSchema,
  },
};

const tournamentListSchema = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: ['number', 'string'] },
      name: { type: 'string' },
      start_time: nullableNumber,
      end_time: nullableNumber,
      registered_user_count: nullableNumber,
      winner: {
        type: ['object', 'null'],
        properties: {
          username: nullableString,
          score: nullableNumber,
        },
      },
    },
    required: ['id'],
  },
};

/**
 * Past-tournaments page schema
 */
const tournamentPageSchema: SchemaObject = {
  type: 'object',
  properties: {
    live_tournament: tournamentListSchema,
    arena: tournamentListSchema,
  },
};

/**
 * Leaderboard schema
 */
const leaderboardSchema: SchemaObject = {
  type: 'object',
  properties: {
    players: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          username: { type: 'string', minLength: 1 },
          rank: { type: ['number', 'string', 'null'] },
          score: nullableNumber,
          rating: nullableNumber,
        },
        required: ['username'],
      },
    },
  },
};

const gameSideSchema = {
  type: 'object',
  properties: {
    username: { type: 'string' },
    rating: { type: 'number' },
    result: { type: 'string' },
  },
};

/**
 * Monthly archive envelope schema
 *
 * Games are validated one at a time so a single odd game does not hide the
 * rest of the month.
 */
const archiveSchema: SchemaObject = {
  type: 'object',
  properties: {
    games: { type: 'array' },
  },
};

const accuracySchema = { type: ['number', 'null'], minimum: 0, maximum: 100 };

/**
 * Archived game schema
 */
const archivedGameSchema: SchemaObject = {
  type: 'object',
  properties: {
    url: { type: 'string', format: 'uri' },
    pgn: { type: 'string' },
    eco: { type: 'string' },
    end_time: { type: 'number' },
    white: gameSideSchema,
    black: gameSideSchema,
    accuracies: {
      type: 'object',
      properties: {
        white: accuracySchema,
        black: accuracySchema,
      },
    },
  },
};

/**
 * Player profile schema
 */
const playerSchema: SchemaObject = {
  type: 'object',
  properties: {
    username: { type: 'string', minLength: 1 },
    player_id: { type: 'number' },
    title: { type: 'string' },
    name: { type: 'string' },
    country: { type: 'string' },
    followers: { type: 'number' },
    joined: { type: 'number' },
    last_online: { type: 'number' },
    status: { type: 'string' },
    url: { type: 'string', format: 'uri' },
  },
  required: ['username'],
};

interface ArchiveEnvelope {
  games?: unknown[];
}

/**
 * Archived game that failed validation
 */
export interface RejectedArchivedGame {
  index: number;
  details: string[];
}

export interface ArchiveParseResult {
  games: ArchivedGamePayload[];
  rejected: RejectedArchivedGame[];
}

// Compile schemas
const validators = {
  club: ajv.compile<ClubPayload>(clubSchema),
  members: ajv.compile<MembersPayload>(membersSchema),
  tournamentPage: ajv.compile<TournamentPagePayload>(tournamentPageSchema),
  leaderboard: ajv.compile<LeaderboardPayload>(leaderboardSchema),
  archive: ajv.compile<ArchiveEnvelope>(archiveSchema),
  archivedGame: ajv.compile<ArchivedGamePayload>(archivedGameSchema),
  player: ajv.compile<PlayerPayload>(playerSchema),
};

/**
 * Format ajv validation errors into field-specific messages
 */
export function formatValidationErrors(errors: ErrorObject[], pathPrefix = ''): string[] {
  return errors.map((error) => {
    const field = pathPrefix + error.instancePath || '/';

    switch (error.keyword) {
      case 'required':
        return `${field}: missing required field ${String(error.params.missingProperty)}`;
      case 'type':
        return `${field}: expected ${String(error.params.type)}`;
      case 'format':
        return `${field}: invalid format, expected ${String(error.params.format)}`;
      case 'minimum':
      case 'maximum':
        return `${field}: must be ${String(error.params.comparison)} ${String(error.params.limit)}`;
      default:
        return `${field}: ${error.message ?? 'validation failed'}`;
    }
  });
}

/**
 * Validate a body and narrow it to the payload type
 *
 * @throws UpstreamPayloadError listing every violation
 */
function validatePayload<T>(
  validator: ValidateFunction<T>,
  body: unknown,
  label: string
): T {
  if (validator(body)) {
    return body;
  }
  const details = formatValidationErrors(validator.errors ?? []);
  throw new UpstreamPayloadError(`Unexpected ${label} payload`, details);
}

export function parseClubPayload(body: unknown): ClubPayload {
  return validatePayload(validators.club, body, 'club');
}

export function parseMembersPayload(body: unknown): MembersPayload {
  return validatePayload(validators.members, body, 'club members');
}

export function parseTournamentPagePayload(body: unknown): TournamentPagePayload {
  return validatePayload(validators.tournamentPage, body, 'club tournaments');
}

export function parseLeaderboardPayload(body: unknown): LeaderboardPayload {
  return validatePayload(validators.leaderboard, body, 'leaderboard');
}

/**
 * Validate a monthly archive game by game
 *
 * Only a malformed envelope throws; games failing their schema are
 * returned in `rejected` with their position and violations.
 *
 * @throws UpstreamPayloadError when the body is not an archive
 */
export function parseArchivePayload(body: unknown): ArchiveParseResult {
  const envelope = validatePayload(validators.archive, body, 'game archive');
  const result: ArchiveParseResult = { games: [], rejected: [] };

  (envelope.games ?? []).forEach((game, index) => {
    if (validators.archivedGame(game)) {
      result.games.push(game);
      return;
    }
    result.rejected.push({
      index,
      details: formatValidationErrors(validators.archivedGame.errors ?? [], `/games/${index}`),
    });
  });

  return result;
}

export function parsePlayerPayload(body: unknown): PlayerPayload {
  return validatePayload(validators.player, body, 'player profile');
}
