import { z } from 'zod';

import { JsonApiClient } from './http.js';
import type { JsonApiClientOptions } from './http.js';

export const CHESS_COM_BASE_URL = 'https://api.chess.com/pub/';

export const PlayerProfileSchema = z.object({
  player_id: z.number().int(),
  '@id': z.string().optional(),
  url: z.string(),
  username: z.string(),
  name: z.string().optional(),
  title: z.string().optional(),
  followers: z.number().int(),
  country: z.string(),
  location: z.string().optional(),
  last_online: z.number(),
  joined: z.number(),
  status: z.string(),
  is_streamer: z.boolean(),
  verified: z.boolean().optional(),
  league: z.string().optional(),
  fide: z.number().optional(),
});

export type PlayerProfile = z.infer<typeof PlayerProfileSchema>;

export const PlayerArchivesSchema = z.object({
  archives: z.array(z.string()),
});

export type PlayerArchives = z.infer<typeof PlayerArchivesSchema>;

const GameSideSchema = z.object({
  username: z.string(),
  rating: z.number(),
  result: z.string(),
  '@id': z.string().optional(),
  uuid: z.string().optional(),
});

export const GameSchema = z.object({
  url: z.string(),
  uuid: z.string(),
  pgn: z.string().optional(),
  fen: z.string().optional(),
  time_control: z.string(),
  time_class: z.string(),
  rules: z.string(),
  rated: z.boolean(),
  end_time: z.number(),
  eco: z.string().optional(),
  accuracies: z.object({ white: z.number(), black: z.number() }).optional(),
  white: GameSideSchema,
  black: GameSideSchema,
});

export type Game = z.infer<typeof GameSchema>;

/**
 * Games are kept unvalidated at the archive level so that one malformed game
 * does not discard the whole month; callers validate each entry with GameSchema.
 */
export const MonthlyArchiveSchema = z.object({
  games: z.array(z.unknown()),
});

export type MonthlyArchive = z.infer<typeof MonthlyArchiveSchema>;

export const OnlineStatusSchema = z.object({
  online: z.boolean(),
});

export type OnlineStatus = z.infer<typeof OnlineStatusSchema>;

export type ChessComClientOptions = Omit<JsonApiClientOptions, 'baseUrl'> & { baseUrl?: string };

const MONTH_PATTERN = /^\d{4}\/(0[1-9]|1[0-2])$/;

export const isMonth = (value: string) => MONTH_PATTERN.test(value);

const playerPath = (username: string) => `player/${encodeURIComponent(username.toLowerCase())}`;

export class ChessComClient extends JsonApiClient {
  constructor(options: ChessComClientOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? CHESS_COM_BASE_URL });
  }

  async getPlayerProfile(username: string): Promise<PlayerProfile> {
    return this.get(playerPath(username), PlayerProfileSchema);
  }

  async getPlayerArchives(username: string): Promise<PlayerArchives> {
    return this.get(`${playerPath(username)}/games/archives`, PlayerArchivesSchema);
  }

  async getMonthlyArchive(url: string): Promise<MonthlyArchive> {
    return this.get(url, MonthlyArchiveSchema);
  }

  async getMonthlyGames(username: string, month: string): Promise<MonthlyArchive> {
    if (!isMonth(month)) {
      throw new RangeError(`Expected month in YYYY/MM format, got ${month}`);
    }
    return this.get(`${playerPath(username)}/games/${month}`, MonthlyArchiveSchema);
  }

  async getOnlineStatus(username: string): Promise<OnlineStatus> {
    return this.get(`${playerPath(username)}/is-online`, OnlineStatusSchema);
  }
}
