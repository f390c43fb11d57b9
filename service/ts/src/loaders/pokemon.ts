import { PokeApiClient } from '@gamedata/clients';

import { readHttpEnv, readPokemonEnv } from '../config.js';
import { getDestination } from '../destinations/index.js';
import { logEnvironment } from '../environment.js';
import { Pipeline, formatLoadInfo } from '../pipeline/index.js';
import type { LoadInfo, Source } from '../pipeline/index.js';
import { createPokemonSource, POKEMON_RESOURCES } from '../sources/pokemon/index.js';
import type { PokemonSourceOptions } from '../sources/pokemon/index.js';
import type { EnvHandlerDeps, LoaderDeps } from './types.js';

export const POKEMON_PIPELINE_NAME = 'pokemon_api';
export const POKEMON_DATASET = 'pokemon_data';

export interface PokemonLoadOptions {
  pokemonLimit?: number | null;
}

export interface PokemonLoaderDeps extends LoaderDeps {
  client?: PokeApiClient;
  createSource?: (options: PokemonSourceOptions) => Source;
}

/**
 * Loads the named PokeAPI resources. A positive limit caps pokemon_details
 * both in the ids it walks and in the rows it yields.
 */
export const loadPokemon = async (
  resources: string[],
  options: PokemonLoadOptions = {},
  deps: PokemonLoaderDeps = {}
): Promise<LoadInfo> => {
  const destination = deps.destination ?? getDestination();
  const pipeline = new Pipeline({
    pipelineName: POKEMON_PIPELINE_NAME,
    datasetName: POKEMON_DATASET,
    destination,
    now: deps.now,
  });
  const limit = options.pokemonLimit ?? null;

  console.log(`Loading Pokemon resources: ${resources.join(', ')}`);
  console.log(`Pokemon limit: ${limit ?? 'none'}`);
  console.log(`Destination: ${destination.type} dataset ${POKEMON_DATASET}`);

  try {
    const createSource = deps.createSource ?? createPokemonSource;
    let source = createSource({
      client: deps.client ?? new PokeApiClient({ retry: deps.retry }),
      pokemonLimit: limit,
      delayMs: deps.delayMs,
    });

    const details = source.resources.get('pokemon_details');
    if (details && limit && limit > 0 && resources.includes('pokemon_details')) {
      source = source.withResource('pokemon_details', details.addLimit(limit));
    }

    const info = await pipeline.run(source.withResources(...resources));
    for (const line of formatLoadInfo(info)) {
      console.log(line);
    }
    return info;
  } catch (err) {
    console.error('pokemon_load_failed', err);
    throw err;
  }
};

export const loadPokemonSample = (deps: PokemonLoaderDeps = {}) => {
  console.log('Loading sample Pokemon data (first 10 Pokemon)...');
  return loadPokemon(['pokemon_details'], { pokemonLimit: 10 }, deps);
};

export const loadAllPokemon = (deps: PokemonLoaderDeps = {}) => {
  console.log('Loading all Pokemon data...');
  return loadPokemon([...POKEMON_RESOURCES], {}, deps);
};

/** Job entry point: everything comes from POKEMON_* and HTTP_* variables. */
export const runPokemonFromEnv = async (deps: PokemonLoaderDeps & EnvHandlerDeps = {}) => {
  const env = deps.env ?? process.env;
  await logEnvironment({ env, ...deps.environment });

  try {
    const config = readPokemonEnv(env);
    const info = await loadPokemon(
      config.resources,
      { pokemonLimit: config.pokemonLimit },
      { ...deps, retry: deps.retry ?? readHttpEnv(env) }
    );
    console.log('Pokemon pipeline execution completed successfully!');
    return info;
  } catch (err) {
    console.error('Pokemon pipeline execution failed:', err instanceof Error ? err.message : err);
    throw err;
  }
};
