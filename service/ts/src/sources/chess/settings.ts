export const CHESS_RESOURCES = [
  'players_profiles',
  'players_games',
  'players_online_status',
  'players_archives',
] as const;

export type ChessResourceName = (typeof CHESS_RESOURCES)[number];

export const DEFAULT_PLAYERS = ['magnuscarlsen', 'rpragchess', 'vincentkeymer', 'dommarajugukesh'];

export const ALL_PLAYERS = [
  ...DEFAULT_PLAYERS,
  'hikaru',
  'danielnaroditsky',
  'alireza2003',
  'firouzja2003',
];

export const REQUEST_DELAY_MS = 100;

export const DEFAULT_LOOKBACK_DAYS = 90;
