export interface FakeResponse {
  status?: number;
  body?: unknown;
}

/**
 * A `fetch` that answers from a route function; unrouted URLs get a 404 like
 * the real APIs do for unknown ids and usernames.
 */
export const createRoutedFetch = (route: (url: URL) => FakeResponse | undefined) => {
  const calls: string[] = [];

  const fetchImpl: typeof fetch = async (input) => {
    const url = new URL(input instanceof URL ? input.href : String(input));
    calls.push(url.href);
    const response = route(url) ?? { status: 404, body: { detail: 'Not found.' } };
    return new Response(JSON.stringify(response.body ?? null), {
      status: response.status ?? 200,
      headers: { 'content-type': 'application/json' },
    });
  };

  return { fetchImpl, calls };
};

const named = (name: string, path = name) => ({ name, url: `https://pokeapi.co/api/v2/${path}/` });

export const pokemonPayload = (id: number) => ({
  id,
  name: `pokemon-${id}`,
  height: 7,
  weight: 69,
  base_experience: id % 2 ? 64 : null,
  is_default: true,
  order: id,
  species: named(`species-${id}`, `pokemon-species/${id}`),
  types: [{ slot: 1, type: named('grass', 'type/12') }],
  abilities: [{ ability: named('overgrow', 'ability/65') }],
  moves: [{ move: named('tackle', 'move/33') }, { move: named('growl', 'move/45') }],
  stats: [
    { base_stat: 45, stat: named('hp', 'stat/1') },
    { base_stat: 49, stat: named('attack', 'stat/2') },
  ],
  sprites: { front_default: `https://img.example/${id}.png`, back_default: null },
});

export const berryPayload = (id: number, name: string) => ({
  id,
  name,
  growth_time: 3,
  max_harvest: 5,
  natural_gift_power: 60,
  size: 20,
  smoothness: 25,
  soil_dryness: 15,
  firmness: named('soft', 'berry-firmness/2'),
  flavors: [
    { potency: 10, flavor: named('spicy', 'berry-flavor/1') },
    { potency: 0, flavor: named('dry', 'berry-flavor/2') },
  ],
  item: named(`${name}-berry`, `item/${id + 125}`),
});

export const listPage = (resource: string, names: string[], next: string | null = null, firstId = 1) => ({
  count: names.length,
  next,
  previous: null,
  results: names.map((name, index) => named(name, `${resource}/${firstId + index}`)),
});

export const profilePayload = (username: string) => ({
  player_id: 3889224,
  url: `https://www.chess.com/member/${username}`,
  username,
  name: 'Test Player',
  title: 'GM',
  followers: 1200,
  country: 'https://api.chess.com/pub/country/NO',
  last_online: 1704067200,
  joined: 1262304000,
  status: 'premium',
  is_streamer: false,
  verified: false,
  league: 'Legend',
});

export const gamePayload = (uuid: string, endTime = 1704153600) => ({
  url: `https://www.chess.com/game/live/${uuid}`,
  uuid,
  pgn: '1. e4 e5 *',
  fen: 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2',
  time_control: '180',
  time_class: 'blitz',
  rules: 'chess',
  rated: true,
  end_time: endTime,
  eco: 'https://www.chess.com/openings/Kings-Pawn-Opening',
  accuracies: { white: 91.5, black: 88.25 },
  white: { username: 'magnuscarlsen', rating: 3200, result: 'win' },
  black: { username: 'opponent', rating: 3000, result: 'resigned' },
});

const effect = (text: string, language: string) => ({
  effect: `${text} (long)`,
  short_effect: text,
  language: named(language, 'language/9'),
});

export const abilityPayload = (id: number, name: string, effects: string[] = []) => ({
  id,
  name,
  is_main_series: true,
  generation: named('generation-iii', 'generation/3'),
  effect_entries: effects.map((text, index) => effect(text, index === 0 ? 'de' : 'en')),
  pokemon: [{ pokemon: named('bulbasaur', 'pokemon/1') }, { pokemon: named('ivysaur', 'pokemon/2') }],
});

export const movePayload = (id: number, name: string, status = false) => ({
  id,
  name,
  accuracy: status ? null : 100,
  effect_chance: null,
  pp: 35,
  priority: 0,
  power: status ? null : 40,
  damage_class: status ? null : named('physical', 'move-damage-class/2'),
  type: named('normal', 'type/1'),
  generation: named('generation-i', 'generation/1'),
  effect_entries: status ? [] : [effect('Inflicts regular damage.', 'en')],
});

export const typePayload = (id: number, name: string) => ({
  id,
  name,
  generation: named('generation-i', 'generation/1'),
  damage_relations: {
    double_damage_from: [named('fire', 'type/10'), named('ice', 'type/15')],
    double_damage_to: [named('water', 'type/11')],
    half_damage_from: [named('water', 'type/11')],
    half_damage_to: [named('fire', 'type/10')],
    no_damage_from: [],
    no_damage_to: [],
  },
  pokemon: [{ pokemon: named('bulbasaur', 'pokemon/1') }],
});
