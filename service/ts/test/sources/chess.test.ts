import { test } from 'node:test';
import assert from 'node:assert/strict';
import { ChessComClient } from '@gamedata/clients';

import { MemoryDestination } from '../../src/destinations/index.js';
import { Pipeline } from '../../src/pipeline/index.js';
import type { DataRecord, ResourceState, Source } from '../../src/pipeline/index.js';
import {
  LOADED_ARCHIVES_STATE_KEY,
  countryCode,
  createChessSource,
  formatMonth,
  isMonthInRange,
  monthOfArchiveUrl,
  monthRangeEndingAt,
  previousMonth,
} from '../../src/sources/chess/index.js';
import { createRoutedFetch, gamePayload, profilePayload } from '../helpers/fetch.js';
import type { FakeResponse } from '../helpers/fetch.js';

const ARCHIVE = (month: string) => `https://api.chess.com/pub/player/magnuscarlsen/games/${month}`;
const checkedAt = new Date('2024-02-10T12:00:00.000Z');

const route = (url: URL): FakeResponse | undefined => {
  switch (url.pathname) {
    case '/pub/player/magnuscarlsen':
      return { body: profilePayload('MagnusCarlsen') };
    case '/pub/player/magnuscarlsen/is-online':
      return { body: { online: true } };
    case '/pub/player/magnuscarlsen/games/archives':
      return { body: { archives: [ARCHIVE('2023/12'), ARCHIVE('2024/01'), ARCHIVE('2024/02')] } };
    case '/pub/player/magnuscarlsen/games/2023/12':
      return { body: { games: [gamePayload('g0', 1703980800)] } };
    case '/pub/player/magnuscarlsen/games/2024/01':
      return { body: { games: [gamePayload('g1'), { uuid: 'broken' }] } };
    case '/pub/player/magnuscarlsen/games/2024/02':
      return { body: { games: [gamePayload('g2', 1706745600)] } };
    default:
      return undefined;
  }
};

const sourceFor = (players: string[], startMonth = '2024/01', endMonth = '2024/01') => {
  const { fetchImpl, calls } = createRoutedFetch(route);
  const source = createChessSource({
    players,
    startMonth,
    endMonth,
    client: new ChessComClient({ fetchImpl }),
    delayMs: 0,
    now: () => checkedAt,
  });
  return { source, calls };
};

const collect = async (source: Source, name: string, state: ResourceState = {}) => {
  const resource = source.resources.get(name);
  assert.ok(resource, `missing resource ${name}`);
  const records: DataRecord[] = [];
  for await (const record of resource.iterate({ state })) records.push(record);
  return records;
};

test('players_profiles fetches each player once, lowercased', async () => {
  const { source, calls } = sourceFor(['MagnusCarlsen', 'magnuscarlsen ']);

  const records = await collect(source, 'players_profiles');

  assert.deepEqual(calls, ['https://api.chess.com/pub/player/magnuscarlsen']);
  assert.deepEqual(records, [
    {
      player_id: 3889224,
      username: 'MagnusCarlsen',
      name: 'Test Player',
      title: 'GM',
      url: 'https://www.chess.com/member/MagnusCarlsen',
      country: 'NO',
      location: null,
      followers: 1200,
      status: 'premium',
      league: 'Legend',
      is_streamer: false,
      verified: false,
      fide: null,
      joined: new Date('2010-01-01T00:00:00.000Z'),
      last_online: new Date('2024-01-01T00:00:00.000Z'),
    },
  ]);
});

test('a player whose profile cannot be fetched is skipped', async (t) => {
  const warn = t.mock.method(console, 'warn', () => {});
  const { source } = sourceFor(['nobody', 'magnuscarlsen']);

  const records = await collect(source, 'players_profiles');

  assert.equal(records.length, 1);
  assert.equal(warn.mock.calls[0]?.arguments[0], 'chess_profile_fetch_failed');
});

test('players_games only fetches archives inside the month range and skips invalid games', async (t) => {
  const warn = t.mock.method(console, 'warn', () => {});
  const { source, calls } = sourceFor(['magnuscarlsen']);
  const state: ResourceState = {};

  const records = await collect(source, 'players_games', state);

  assert.deepEqual(calls, [
    'https://api.chess.com/pub/player/magnuscarlsen/games/archives',
    ARCHIVE('2024/01'),
  ]);
  assert.equal(records.length, 1);
  assert.deepEqual(records[0], {
    username: 'magnuscarlsen',
    game_id: 'g1',
    month: '2024/01',
    url: 'https://www.chess.com/game/live/g1',
    time_control: '180',
    time_class: 'blitz',
    rules: 'chess',
    rated: true,
    end_time: new Date('2024-01-02T00:00:00.000Z'),
    eco: 'https://www.chess.com/openings/Kings-Pawn-Opening',
    fen: 'rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq - 0 2',
    pgn: '1. e4 e5 *',
    white_username: 'magnuscarlsen',
    white_rating: 3200,
    white_result: 'win',
    white_accuracy: 91.5,
    black_username: 'opponent',
    black_rating: 3000,
    black_result: 'resigned',
    black_accuracy: 88.25,
  });
  assert.equal(warn.mock.calls[0]?.arguments[0], 'chess_game_skipped');
  assert.deepEqual(state[LOADED_ARCHIVES_STATE_KEY], { magnuscarlsen: [ARCHIVE('2024/01')] });
});

test('archives loaded by an earlier run are skipped except the latest one', async () => {
  const { source, calls } = sourceFor(['magnuscarlsen'], '2023/12', '2024/02');
  const state: ResourceState = {
    [LOADED_ARCHIVES_STATE_KEY]: { magnuscarlsen: [ARCHIVE('2023/12'), ARCHIVE('2024/02')] },
  };

  const records = await collect(source, 'players_games', state);

  assert.deepEqual(calls.slice(1), [ARCHIVE('2024/01'), ARCHIVE('2024/02')]);
  assert.deepEqual(
    records.map((record) => record.game_id),
    ['g1', 'g2']
  );
  assert.deepEqual(state[LOADED_ARCHIVES_STATE_KEY], {
    magnuscarlsen: [ARCHIVE('2023/12'), ARCHIVE('2024/02'), ARCHIVE('2024/01')],
  });
});

test('games added to an archive after it was loaded are picked up once a newer month appears', async () => {
  const months: Record<string, string[]> = { '2024/01': ['early1', 'early2'] };
  const { fetchImpl, calls } = createRoutedFetch((url) => {
    if (url.pathname === '/pub/player/magnuscarlsen/games/archives') {
      return { body: { archives: Object.keys(months).map(ARCHIVE) } };
    }
    const month = url.pathname.replace('/pub/player/magnuscarlsen/games/', '');
    const games = months[month];
    return games ? { body: { games: games.map((uuid) => gamePayload(uuid)) } } : undefined;
  });
  const destination = new MemoryDestination();
  const run = () =>
    new Pipeline({ pipelineName: 'chess_api', datasetName: 'chess_data', destination }).run(
      createChessSource({
        players: ['magnuscarlsen'],
        startMonth: '2024/01',
        endMonth: '2024/12',
        client: new ChessComClient({ fetchImpl }),
        delayMs: 0,
      }).withResources('players_games')
    );
  const gameIds = () => destination.rows('chess_data', 'players_games').map((row) => row.game_id);

  await run();
  assert.deepEqual(gameIds(), ['early1', 'early2']);

  months['2024/01'] = ['early1', 'early2', 'late1', 'late2'];
  months['2024/02'] = ['feb1'];
  await run();
  assert.deepEqual(gameIds(), ['early1', 'early2', 'late1', 'late2', 'feb1']);
  assert.deepEqual(await destination.getState('chess_data', 'chess_api'), {
    players_games: { [LOADED_ARCHIVES_STATE_KEY]: { magnuscarlsen: [ARCHIVE('2024/01')] } },
  });

  calls.length = 0;
  await run();
  assert.deepEqual(calls, [
    'https://api.chess.com/pub/player/magnuscarlsen/games/archives',
    ARCHIVE('2024/02'),
  ]);
  assert.equal(gameIds().length, 5);
});

test('players_games merges on username and game id', () => {
  const { source } = sourceFor(['magnuscarlsen']);
  const games = source.resources.get('players_games');

  assert.equal(games?.writeDisposition, 'merge');
  assert.deepEqual(games?.primaryKey, ['username', 'game_id']);
});

test('players_online_status records the check time', async () => {
  const { source } = sourceFor(['magnuscarlsen']);

  const records = await collect(source, 'players_online_status');

  assert.deepEqual(records, [{ username: 'magnuscarlsen', online: true, checked_at: checkedAt }]);
});

test('players_archives yields one row per archive month', async () => {
  const { source } = sourceFor(['magnuscarlsen']);

  const records = await collect(source, 'players_archives');

  assert.deepEqual(
    records.map((record) => record.month),
    ['2023/12', '2024/01', '2024/02']
  );
  assert.deepEqual(records[0], { username: 'magnuscarlsen', month: '2023/12', url: ARCHIVE('2023/12') });
});

test('month helpers work in UTC YYYY/MM strings', () => {
  assert.equal(formatMonth(new Date('2024-03-31T23:30:00.000Z')), '2024/03');
  assert.deepEqual(monthRangeEndingAt(new Date('2024-03-15T00:00:00.000Z'), 90), {
    startMonth: '2023/12',
    endMonth: '2024/03',
  });
  assert.equal(previousMonth(new Date('2024-01-15T00:00:00.000Z')), '2023/12');
  assert.equal(monthOfArchiveUrl(`${ARCHIVE('2024/01')}/`), '2024/01');
  assert.equal(monthOfArchiveUrl('https://api.chess.com/pub/player/x/games'), null);
  assert.equal(isMonthInRange('2024/01', '2023/12', '2024/01'), true);
  assert.equal(isMonthInRange('2024/02', '2023/12', '2024/01'), false);
});

test('countryCode takes the last path segment of the country URL', () => {
  assert.equal(countryCode('https://api.chess.com/pub/country/US/'), 'US');
});
