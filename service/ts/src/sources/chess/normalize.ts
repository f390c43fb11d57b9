import type { Game, OnlineStatus, PlayerProfile } from '@gamedata/clients';

import { monthOfArchiveUrl } from './months.js';

export type PlayerProfileRecord = {
  player_id: number;
  username: string;
  name: string | null;
  title: string | null;
  url: string;
  country: string | null;
  location: string | null;
  followers: number;
  status: string;
  league: string | null;
  is_streamer: boolean;
  verified: boolean | null;
  fide: number | null;
  joined: Date;
  last_online: Date;
};

export type GameRecord = {
  username: string;
  game_id: string;
  month: string;
  url: string;
  time_control: string;
  time_class: string;
  rules: string;
  rated: boolean;
  end_time: Date;
  eco: string | null;
  fen: string | null;
  pgn: string | null;
  white_username: string;
  white_rating: number;
  white_result: string;
  white_accuracy: number | null;
  black_username: string;
  black_rating: number;
  black_result: string;
  black_accuracy: number | null;
};

export type OnlineStatusRecord = {
  username: string;
  online: boolean;
  checked_at: Date;
};

export type ArchiveRecord = {
  username: string;
  month: string;
  url: string;
};

const fromUnixSeconds = (seconds: number) => new Date(seconds * 1000);

/** Country comes as an API URL such as `.../pub/country/NO`. */
export const countryCode = (countryUrl: string): string | null => {
  const code = countryUrl.replace(/\/+$/, '').split('/').pop();
  return code ? code : null;
};

export const normalizeProfile = (profile: PlayerProfile): PlayerProfileRecord => ({
  player_id: profile.player_id,
  username: profile.username,
  name: profile.name ?? null,
  title: profile.title ?? null,
  url: profile.url,
  country: countryCode(profile.country),
  location: profile.location ?? null,
  followers: profile.followers,
  status: profile.status,
  league: profile.league ?? null,
  is_streamer: profile.is_streamer,
  verified: profile.verified ?? null,
  fide: profile.fide ?? null,
  joined: fromUnixSeconds(profile.joined),
  last_online: fromUnixSeconds(profile.last_online),
});

export const normalizeGame = (username: string, month: string, game: Game): GameRecord => ({
  username,
  game_id: game.uuid,
  month,
  url: game.url,
  time_control: game.time_control,
  time_class: game.time_class,
  rules: game.rules,
  rated: game.rated,
  end_time: fromUnixSeconds(game.end_time),
  eco: game.eco ?? null,
  fen: game.fen ?? null,
  pgn: game.pgn ?? null,
  white_username: game.white.username,
  white_rating: game.white.rating,
  white_result: game.white.result,
  white_accuracy: game.accuracies?.white ?? null,
  black_username: game.black.username,
  black_rating: game.black.rating,
  black_result: game.black.result,
  black_accuracy: game.accuracies?.black ?? null,
});

export const normalizeOnlineStatus = (
  username: string,
  status: OnlineStatus,
  checkedAt: Date
): OnlineStatusRecord => ({
  username,
  online: status.online,
  checked_at: checkedAt,
});

export const normalizeArchive = (username: string, url: string): ArchiveRecord | null => {
  const month = monthOfArchiveUrl(url);
  return month ? { username, month, url } : null;
};
