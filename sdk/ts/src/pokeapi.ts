import { z } from 'zod';

import { JsonApiClient } from './http.js';
import type { JsonApiClientOptions } from './http.js';

export const POKEAPI_BASE_URL = 'https://pokeapi.co/api/v2/';

export type PokeApiListResource = 'pokemon' | 'berry' | 'ability' | 'move' | 'type';

const NamedResourceSchema = z.object({
  name: z.string(),
  url: z.string(),
});

export type NamedResource = z.infer<typeof NamedResourceSchema>;

export const NamedResourcePageSchema = z.object({
  count: z.number().int(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(NamedResourceSchema),
});

export type NamedResourcePage = z.infer<typeof NamedResourcePageSchema>;

const EffectEntrySchema = z.object({
  effect: z.string(),
  short_effect: z.string(),
  language: NamedResourceSchema.optional(),
});

export const PokemonSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  height: z.number(),
  weight: z.number(),
  base_experience: z.number().nullable(),
  is_default: z.boolean(),
  order: z.number().int(),
  species: NamedResourceSchema,
  types: z.array(z.object({ slot: z.number().int().optional(), type: NamedResourceSchema })),
  abilities: z.array(z.object({ ability: NamedResourceSchema })),
  moves: z.array(z.object({ move: NamedResourceSchema })),
  stats: z.array(z.object({ base_stat: z.number(), stat: NamedResourceSchema })),
  sprites: z.object({
    front_default: z.string().nullable().optional(),
    back_default: z.string().nullable().optional(),
    front_shiny: z.string().nullable().optional(),
    back_shiny: z.string().nullable().optional(),
  }),
});

export type Pokemon = z.infer<typeof PokemonSchema>;

export const BerrySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  growth_time: z.number(),
  max_harvest: z.number(),
  natural_gift_power: z.number(),
  size: z.number(),
  smoothness: z.number(),
  soil_dryness: z.number(),
  firmness: NamedResourceSchema,
  flavors: z.array(z.object({ potency: z.number(), flavor: NamedResourceSchema })),
  item: NamedResourceSchema.nullable(),
});

export type Berry = z.infer<typeof BerrySchema>;

export const AbilitySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  is_main_series: z.boolean(),
  generation: NamedResourceSchema,
  effect_entries: z.array(EffectEntrySchema),
  pokemon: z.array(z.object({ pokemon: NamedResourceSchema })),
});

export type Ability = z.infer<typeof AbilitySchema>;

export const MoveSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  accuracy: z.number().nullable(),
  effect_chance: z.number().nullable(),
  pp: z.number().nullable(),
  priority: z.number(),
  power: z.number().nullable(),
  damage_class: NamedResourceSchema.nullable(),
  type: NamedResourceSchema,
  generation: NamedResourceSchema,
  effect_entries: z.array(EffectEntrySchema),
});

export type Move = z.infer<typeof MoveSchema>;

const NamedResourceListSchema = z.array(NamedResourceSchema);

export const TypeSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  generation: NamedResourceSchema,
  damage_relations: z.object({
    double_damage_from: NamedResourceListSchema,
    double_damage_to: NamedResourceListSchema,
    half_damage_from: NamedResourceListSchema,
    half_damage_to: NamedResourceListSchema,
    no_damage_from: NamedResourceListSchema,
    no_damage_to: NamedResourceListSchema,
  }),
  pokemon: z.array(z.object({ pokemon: NamedResourceSchema })),
});

export type PokemonType = z.infer<typeof TypeSchema>;

export type PokeApiClientOptions = Omit<JsonApiClientOptions, 'baseUrl'> & { baseUrl?: string };

/**
 * Read-only client for PokeAPI. List endpoints return named resources whose
 * `url` points at the detail endpoint, so detail getters take that URL.
 */
export class PokeApiClient extends JsonApiClient {
  constructor(options: PokeApiClientOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? POKEAPI_BASE_URL });
  }

  async listPage(
    resource: PokeApiListResource,
    options: { limit?: number; offset?: number } = {}
  ): Promise<NamedResourcePage> {
    const url = this.resolve(resource);
    if (options.limit !== undefined) url.searchParams.set('limit', String(options.limit));
    if (options.offset !== undefined) url.searchParams.set('offset', String(options.offset));
    return this.get(url.href, NamedResourcePageSchema);
  }

  async listPageAt(url: string): Promise<NamedResourcePage> {
    return this.get(url, NamedResourcePageSchema);
  }

  async getPokemon(id: number): Promise<Pokemon> {
    return this.get(`pokemon/${id}`, PokemonSchema);
  }

  async getBerry(url: string): Promise<Berry> {
    return this.get(url, BerrySchema);
  }

  async getAbility(url: string): Promise<Ability> {
    return this.get(url, AbilitySchema);
  }

  async getMove(url: string): Promise<Move> {
    return this.get(url, MoveSchema);
  }

  async getType(url: string): Promise<PokemonType> {
    return this.get(url, TypeSchema);
  }
}
