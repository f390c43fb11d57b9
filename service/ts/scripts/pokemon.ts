#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { readHttpEnv } from '../src/config.js';
import { getDestination } from '../src/destinations/index.js';
import { isCloudRun } from '../src/environment.js';
import {
  loadAllPokemon,
  loadPokemon,
  loadPokemonSample,
  runPokemonFromEnv,
} from '../src/loaders/pokemon.js';
import { POKEMON_RESOURCES } from '../src/sources/pokemon/settings.js';

const deps = () => ({ retry: readHttpEnv() });

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('pokemon')
    .command(
      '$0',
      'Run from POKEMON_* variables on Cloud Run, otherwise load a small sample',
      () => {},
      async () => {
        if (isCloudRun()) {
          await runPokemonFromEnv();
        } else {
          await loadPokemonSample(deps());
        }
      }
    )
    .command('env', 'Run from POKEMON_* variables', () => {}, async () => {
      await runPokemonFromEnv();
    })
    .command('sample', 'Load the first 10 Pokemon', () => {}, async () => {
      await loadPokemonSample(deps());
    })
    .command('all', 'Load every resource without a limit', () => {}, async () => {
      await loadAllPokemon(deps());
    })
    .command(
      'load',
      'Load the chosen resources',
      (cmd) =>
        cmd
          .option('resources', {
            type: 'string',
            array: true,
            choices: POKEMON_RESOURCES,
            default: ['pokemon_details'],
            describe: 'Resources to load',
          })
          .option('limit', {
            type: 'number',
            describe: 'Highest Pokemon id to fetch',
          }),
      async (argv) => {
        await loadPokemon(argv.resources, { pokemonLimit: argv.limit }, deps());
      }
    )
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(async () => {
    try {
      await getDestination().close();
    } catch (err) {
      console.error('Failed to close destination', err);
    }
  });
