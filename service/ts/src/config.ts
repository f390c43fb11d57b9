import { isMonth } from '@gamedata/clients';
import type { RetryPolicy } from '@gamedata/clients';
import { z } from 'zod';

import { CHESS_RESOURCES } from './sources/chess/settings.js';
import type { ChessResourceName } from './sources/chess/settings.js';
import { POKEMON_RESOURCES } from './sources/pokemon/settings.js';
import type { PokemonResourceName } from './sources/pokemon/settings.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

export const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const MonthSchema = optionalString.refine((value) => value === undefined || isMonth(value), {
  message: 'expected YYYY/MM',
});

/** Validates a month given on the command line. Blank values count as unset. */
export const parseMonthOption = (value: string | undefined): string | undefined => {
  const month = value?.trim();
  if (!month) return undefined;
  if (!isMonth(month)) {
    throw new ConfigError(`Invalid month ${month}`, [`expected YYYY/MM, got ${month}`]);
  }
  return month;
};

const PokemonEnvSchema = z.object({
  POKEMON_RESOURCES: z
    .string()
    .default('pokemon_details')
    .transform(splitList)
    .pipe(z.array(z.enum(POKEMON_RESOURCES)).min(1)),
  POKEMON_LIMIT: optionalString.pipe(z.coerce.number().int().positive().optional()),
});

const ChessEnvSchema = z.object({
  CHESS_RESOURCES: z
    .string()
    .default('players_profiles,players_online_status')
    .transform(splitList)
    .pipe(z.array(z.enum(CHESS_RESOURCES)).min(1)),
  CHESS_PLAYERS: optionalString.transform((value) => {
    const players = splitList(value);
    return players.length ? players : undefined;
  }),
  CHESS_START_MONTH: MonthSchema,
  CHESS_END_MONTH: MonthSchema,
});

const HttpEnvSchema = z.object({
  HTTP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  HTTP_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
});

export interface PokemonRunConfig {
  resources: PokemonResourceName[];
  pokemonLimit?: number;
}

export interface ChessRunConfig {
  resources: ChessResourceName[];
  players?: string[];
  startMonth?: string;
  endMonth?: string;
}

const parseEnv = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: Env, label: string): T => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid ${label} configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
};

export const readPokemonEnv = (env: Env = process.env): PokemonRunConfig => {
  const parsed = parseEnv(PokemonEnvSchema, env, 'pokemon');
  return { resources: parsed.POKEMON_RESOURCES, pokemonLimit: parsed.POKEMON_LIMIT };
};

export const readChessEnv = (env: Env = process.env): ChessRunConfig => {
  const parsed = parseEnv(ChessEnvSchema, env, 'chess');
  return {
    resources: parsed.CHESS_RESOURCES,
    players: parsed.CHESS_PLAYERS,
    startMonth: parsed.CHESS_START_MONTH,
    endMonth: parsed.CHESS_END_MONTH,
  };
};

export const readHttpEnv = (env: Env = process.env): RetryPolicy => {
  const parsed = parseEnv(HttpEnvSchema, env, 'http');
  return { attempts: parsed.HTTP_RETRY_ATTEMPTS, backoffMs: parsed.HTTP_RETRY_BACKOFF_MS };
};
