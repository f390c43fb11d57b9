import type { Ability, Berry, Move, Pokemon, PokemonType } from '@gamedata/clients';

export type PokemonDetailRecord = {
  id: number;
  name: string;
  height: number;
  weight: number;
  base_experience: number | null;
  is_default: boolean;
  order: number;
  species: string;
  types: string[];
  abilities: string[];
  moves: string[];
  stats: Record<string, number>;
  sprites: {
    front_default: string | null;
    back_default: string | null;
    front_shiny: string | null;
    back_shiny: string | null;
  };
};

export type BerryRecord = {
  id: number;
  name: string;
  growth_time: number;
  max_harvest: number;
  natural_gift_power: number;
  size: number;
  smoothness: number;
  soil_dryness: number;
  firmness: string;
  flavors: Record<string, number>;
  item: string | null;
};

export type AbilityRecord = {
  id: number;
  name: string;
  is_main_series: boolean;
  generation: string;
  effect: string | null;
  short_effect: string | null;
  pokemon: string[];
};

export type MoveRecord = {
  id: number;
  name: string;
  accuracy: number | null;
  effect_chance: number | null;
  pp: number | null;
  priority: number;
  power: number | null;
  damage_class: string | null;
  type: string;
  generation: string;
  effect: string | null;
  short_effect: string | null;
};

export type TypeRecord = {
  id: number;
  name: string;
  generation: string;
  damage_relations: {
    double_damage_from: string[];
    double_damage_to: string[];
    half_damage_from: string[];
    half_damage_to: string[];
    no_damage_from: string[];
    no_damage_to: string[];
  };
  pokemon: string[];
};

const names = (entries: Array<{ name: string }>) => entries.map((entry) => entry.name);

export const normalizePokemon = (pokemon: Pokemon): PokemonDetailRecord => ({
  id: pokemon.id,
  name: pokemon.name,
  height: pokemon.height,
  weight: pokemon.weight,
  base_experience: pokemon.base_experience,
  is_default: pokemon.is_default,
  order: pokemon.order,
  species: pokemon.species.name,
  types: pokemon.types.map((entry) => entry.type.name),
  abilities: pokemon.abilities.map((entry) => entry.ability.name),
  moves: pokemon.moves.map((entry) => entry.move.name),
  stats: Object.fromEntries(pokemon.stats.map((entry) => [entry.stat.name, entry.base_stat])),
  sprites: {
    front_default: pokemon.sprites.front_default ?? null,
    back_default: pokemon.sprites.back_default ?? null,
    front_shiny: pokemon.sprites.front_shiny ?? null,
    back_shiny: pokemon.sprites.back_shiny ?? null,
  },
});

export const normalizeBerry = (berry: Berry): BerryRecord => ({
  id: berry.id,
  name: berry.name,
  growth_time: berry.growth_time,
  max_harvest: berry.max_harvest,
  natural_gift_power: berry.natural_gift_power,
  size: berry.size,
  smoothness: berry.smoothness,
  soil_dryness: berry.soil_dryness,
  firmness: berry.firmness.name,
  flavors: Object.fromEntries(berry.flavors.map((entry) => [entry.flavor.name, entry.potency])),
  item: berry.item?.name ?? null,
});

// only the first effect entry is kept, whatever its language
export const normalizeAbility = (ability: Ability): AbilityRecord => {
  const [effect] = ability.effect_entries;
  return {
    id: ability.id,
    name: ability.name,
    is_main_series: ability.is_main_series,
    generation: ability.generation.name,
    effect: effect?.effect ?? null,
    short_effect: effect?.short_effect ?? null,
    pokemon: ability.pokemon.map((entry) => entry.pokemon.name),
  };
};

export const normalizeMove = (move: Move): MoveRecord => {
  const [effect] = move.effect_entries;
  return {
    id: move.id,
    name: move.name,
    accuracy: move.accuracy,
    effect_chance: move.effect_chance,
    pp: move.pp,
    priority: move.priority,
    power: move.power,
    damage_class: move.damage_class?.name ?? null,
    type: move.type.name,
    generation: move.generation.name,
    effect: effect?.effect ?? null,
    short_effect: effect?.short_effect ?? null,
  };
};

export const normalizeType = (type: PokemonType): TypeRecord => {
  const relations = type.damage_relations;
  return {
    id: type.id,
    name: type.name,
    generation: type.generation.name,
    damage_relations: {
      double_damage_from: names(relations.double_damage_from),
      double_damage_to: names(relations.double_damage_to),
      half_damage_from: names(relations.half_damage_from),
      half_damage_to: names(relations.half_damage_to),
      no_damage_from: names(relations.no_damage_from),
      no_damage_to: names(relations.no_damage_to),
    },
    pokemon: type.pokemon.map((entry) => entry.pokemon.name),
  };
};
