export const POKEMON_RESOURCES = ['pokemon_details', 'berries', 'abilities', 'moves', 'types'] as const;

export type PokemonResourceName = (typeof POKEMON_RESOURCES)[number];

/** Highest national dex id the loader walks when no limit is given. */
export const MAX_POKEMON_ID = 1010;

export const LIST_PAGE_SIZE = 20;

export const REQUEST_DELAY_MS = 100;
