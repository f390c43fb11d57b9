import { test } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigError } from '../../src/config.js';
import { MemoryDestination } from '../../src/destinations/index.js';
import { loadChess, loadChessSample, resolveChessParams, runChessFromEnv } from '../../src/loaders/chess.js';
import { defineResource, defineSource } from '../../src/pipeline/index.js';
import { DEFAULT_PLAYERS } from '../../src/sources/chess/index.js';
import type { ChessSourceOptions } from '../../src/sources/chess/index.js';

const now = () => new Date('2024-03-15T00:00:00.000Z');

const capturingSource = () => {
  const received: ChessSourceOptions[] = [];
  const createSource = (options: ChessSourceOptions) => {
    received.push(options);
    return defineSource('chess', [
      defineResource(
        'players_profiles',
        async function* () {
          for (const username of options.players) yield { username };
        },
        { writeDisposition: 'replace' }
      ),
      defineResource('players_games', async function* () {}, {
        writeDisposition: 'merge',
        primaryKey: ['username', 'game_id'],
      }),
      defineResource('players_online_status', async function* () {}),
    ]);
  };
  return { received, createSource };
};

test('equal start and end months reach the source unchanged with the default players', async (t) => {
  t.mock.method(console, 'log', () => {});
  const { received, createSource } = capturingSource();
  const destination = new MemoryDestination();

  await loadChess(
    ['players_profiles'],
    { startMonth: '2024/01', endMonth: '2024/01' },
    { createSource, destination, now }
  );

  assert.equal(received.length, 1);
  assert.equal(received[0]?.startMonth, '2024/01');
  assert.equal(received[0]?.endMonth, '2024/01');
  assert.deepEqual(received[0]?.players, DEFAULT_PLAYERS);
  assert.deepEqual(
    destination.rows('chess_data', 'players_profiles').map((row) => row.username),
    ['magnuscarlsen', 'rpragchess', 'vincentkeymer', 'dommarajugukesh']
  );
});

test('a missing bound falls back to the last 90 days', () => {
  assert.deepEqual(resolveChessParams({ players: ['hikaru'], startMonth: '2024/01' }, now()), {
    players: ['hikaru'],
    startMonth: '2023/12',
    endMonth: '2024/03',
  });
});

test('a start month after the end month is rejected', async (t) => {
  t.mock.method(console, 'log', () => {});
  const error = t.mock.method(console, 'error', () => {});

  await assert.rejects(
    loadChess(['players_profiles'], { startMonth: '2024/02', endMonth: '2024/01' }, {
      destination: new MemoryDestination(),
      now,
    }),
    ConfigError
  );
  assert.equal(error.mock.calls[0]?.arguments[0], 'chess_load_failed');
});

test('the sample loads one player over the previous month', async (t) => {
  t.mock.method(console, 'log', () => {});
  const { received, createSource } = capturingSource();

  const info = await loadChessSample({ createSource, destination: new MemoryDestination(), now });

  assert.deepEqual(received[0]?.players, ['magnuscarlsen']);
  assert.equal(received[0]?.startMonth, '2024/02');
  assert.equal(received[0]?.endMonth, '2024/02');
  assert.deepEqual(Object.keys(info.loadPackages[0]?.tables ?? {}), [
    'players_profiles',
    'players_games',
    'players_online_status',
  ]);
});

test('runChessFromEnv passes players and months from the environment', async (t) => {
  t.mock.method(console, 'log', () => {});
  const { received, createSource } = capturingSource();

  await runChessFromEnv({
    env: {
      CHESS_RESOURCES: 'players_profiles',
      CHESS_PLAYERS: 'Hikaru, firouzja2003',
      CHESS_START_MONTH: '2023/11',
      CHESS_END_MONTH: '2024/01',
      GOOGLE_CLOUD_PROJECT: 'test-project',
      GOOGLE_CLOUD_REGION: 'us-central1',
    },
    createSource,
    destination: new MemoryDestination(),
    now,
  });

  assert.deepEqual(received[0]?.players, ['Hikaru', 'firouzja2003']);
  assert.equal(received[0]?.startMonth, '2023/11');
  assert.equal(received[0]?.endMonth, '2024/01');
});

test('runChessFromEnv re-throws invalid months', async (t) => {
  t.mock.method(console, 'log', () => {});
  const error = t.mock.method(console, 'error', () => {});

  await assert.rejects(
    runChessFromEnv({
      env: {
        CHESS_START_MONTH: '2024-01',
        GOOGLE_CLOUD_PROJECT: 'test-project',
        GOOGLE_CLOUD_REGION: 'us-central1',
      },
      destination: new MemoryDestination(),
      now,
    }),
    ConfigError
  );
  assert.equal(error.mock.calls[0]?.arguments[0], 'Chess pipeline execution failed:');
});
