import { PokeApiClient } from '@gamedata/clients';
import type { NamedResourcePage, PokeApiListResource } from '@gamedata/clients';

import { defineResource, defineSource } from '../../pipeline/index.js';
import type { DataRecord, Source } from '../../pipeline/index.js';
import { createPacer, fetchOrSkip } from '../fetching.js';
import type { Sleep } from '../fetching.js';
import {
  normalizeAbility,
  normalizeBerry,
  normalizeMove,
  normalizePokemon,
  normalizeType,
} from './normalize.js';
import { LIST_PAGE_SIZE, MAX_POKEMON_ID, REQUEST_DELAY_MS } from './settings.js';

export * from './normalize.js';
export * from './settings.js';

export interface PokemonSourceOptions {
  client?: PokeApiClient;
  /** Walk ids 1..min(limit, MAX_POKEMON_ID); no or non-positive limit means all. */
  pokemonLimit?: number | null;
  delayMs?: number;
  sleep?: Sleep;
}

export const pokemonIdCeiling = (limit?: number | null) =>
  limit && limit > 0 ? Math.min(limit, MAX_POKEMON_ID) : MAX_POKEMON_ID;

interface ListedResource<P, T extends DataRecord> {
  list: PokeApiListResource;
  label: string;
  fetchDetail: (url: string) => Promise<P>;
  normalize: (payload: P) => T;
}

export const createPokemonSource = (options: PokemonSourceOptions = {}): Source => {
  const client = options.client ?? new PokeApiClient();
  const delayMs = options.delayMs ?? REQUEST_DELAY_MS;
  const ceiling = pokemonIdCeiling(options.pokemonLimit);

  async function* pokemonDetails() {
    const pace = createPacer(delayMs, options.sleep);
    for (let id = 1; id <= ceiling; id += 1) {
      await pace();
      const pokemon = await fetchOrSkip('pokemon_fetch_failed', { id }, () => client.getPokemon(id));
      if (pokemon) yield normalizePokemon(pokemon);
    }
  }

  /**
   * Walks the list endpoint page by page and fetches each entry's detail URL
   * in list order. A failed first page leaves the sequence empty; a failed
   * later page ends it.
   */
  const listed = <P, T extends DataRecord>(listing: ListedResource<P, T>) =>
    async function* (): AsyncGenerator<T> {
      const pace = createPacer(delayMs, options.sleep);
      let page: NamedResourcePage | null = await fetchOrSkip(
        `${listing.label}_list_failed`,
        { resource: listing.list },
        () => client.listPage(listing.list, { limit: LIST_PAGE_SIZE, offset: 0 })
      );

      while (page) {
        for (const entry of page.results) {
          await pace();
          const payload = await fetchOrSkip(
            `${listing.label}_fetch_failed`,
            { name: entry.name, url: entry.url },
            () => listing.fetchDetail(entry.url)
          );
          if (payload) yield listing.normalize(payload);
        }

        const next = page.next;
        page = next
          ? await fetchOrSkip(`${listing.label}_list_failed`, { resource: listing.list, url: next }, () =>
              client.listPageAt(next)
            )
          : null;
      }
    };

  return defineSource('pokemon', [
    defineResource('pokemon_details', pokemonDetails, { writeDisposition: 'replace' }),
    defineResource(
      'berries',
      listed({
        list: 'berry',
        label: 'berry',
        fetchDetail: (url) => client.getBerry(url),
        normalize: normalizeBerry,
      }),
      { writeDisposition: 'replace' }
    ),
    defineResource(
      'abilities',
      listed({
        list: 'ability',
        label: 'ability',
        fetchDetail: (url) => client.getAbility(url),
        normalize: normalizeAbility,
      }),
      { writeDisposition: 'replace' }
    ),
    defineResource(
      'moves',
      listed({
        list: 'move',
        label: 'move',
        fetchDetail: (url) => client.getMove(url),
        normalize: normalizeMove,
      }),
      { writeDisposition: 'replace' }
    ),
    defineResource(
      'types',
      listed({
        list: 'type',
        label: 'type',
        fetchDetail: (url) => client.getType(url),
        normalize: normalizeType,
      }),
      { writeDisposition: 'replace' }
    ),
  ]);
};
