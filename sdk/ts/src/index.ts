export {
  JsonApiClient,
  ApiRequestError,
  ApiPayloadError,
  DEFAULT_USER_AGENT,
} from './http.js';
export type { JsonApiClientOptions, RetryPolicy } from './http.js';

export {
  PokeApiClient,
  POKEAPI_BASE_URL,
  NamedResourcePageSchema,
  PokemonSchema,
  BerrySchema,
  AbilitySchema,
  MoveSchema,
  TypeSchema,
} from './pokeapi.js';
export type {
  PokeApiClientOptions,
  PokeApiListResource,
  NamedResource,
  NamedResourcePage,
  Pokemon,
  Berry,
  Ability,
  Move,
  PokemonType,
} from './pokeapi.js';

export {
  ChessComClient,
  CHESS_COM_BASE_URL,
  PlayerProfileSchema,
  PlayerArchivesSchema,
  GameSchema,
  MonthlyArchiveSchema,
  OnlineStatusSchema,
  isMonth,
} from './chess.js';
export type {
  ChessComClientOptions,
  PlayerProfile,
  PlayerArchives,
  Game,
  MonthlyArchive,
  OnlineStatus,
} from './chess.js';
