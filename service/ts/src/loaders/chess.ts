import { ChessComClient } from '@gamedata/clients';

import { ConfigError, readChessEnv, readHttpEnv } from '../config.js';
import { getDestination } from '../destinations/index.js';
import { logEnvironment } from '../environment.js';
import { Pipeline, formatLoadInfo } from '../pipeline/index.js';
import type { LoadInfo, Source } from '../pipeline/index.js';
import {
  ALL_PLAYERS,
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_PLAYERS,
  createChessSource,
  monthRangeEndingAt,
  previousMonth,
} from '../sources/chess/index.js';
import type { ChessSourceOptions, ChessSourceParams } from '../sources/chess/index.js';
import type { EnvHandlerDeps, LoaderDeps } from './types.js';

export const CHESS_PIPELINE_NAME = 'chess_api';
export const CHESS_DATASET = 'chess_data';

export interface ChessLoadOptions {
  players?: string[] | null;
  startMonth?: string | null;
  endMonth?: string | null;
}

export interface ChessLoaderDeps extends LoaderDeps {
  client?: ChessComClient;
  createSource?: (options: ChessSourceOptions) => Source;
}

/**
 * Fills in the default players and, unless both bounds are given, a range
 * covering the last 90 days.
 */
export const resolveChessParams = (options: ChessLoadOptions, now: Date): ChessSourceParams => {
  const players = options.players?.length ? options.players : DEFAULT_PLAYERS;
  const range =
    options.startMonth && options.endMonth
      ? { startMonth: options.startMonth, endMonth: options.endMonth }
      : monthRangeEndingAt(now, DEFAULT_LOOKBACK_DAYS);

  if (range.startMonth > range.endMonth) {
    throw new ConfigError(`Start month ${range.startMonth} is after end month ${range.endMonth}`, [
      'startMonth: must not be after endMonth',
    ]);
  }

  return { players: [...players], ...range };
};

export const loadChess = async (
  resources: string[],
  options: ChessLoadOptions = {},
  deps: ChessLoaderDeps = {}
): Promise<LoadInfo> => {
  const now = deps.now ?? (() => new Date());
  const destination = deps.destination ?? getDestination();
  const pipeline = new Pipeline({
    pipelineName: CHESS_PIPELINE_NAME,
    datasetName: CHESS_DATASET,
    destination,
    now,
  });

  try {
    const params = resolveChessParams(options, now());
    console.log(`Loading chess data for players: ${params.players.join(', ')}`);
    console.log(`Date range: ${params.startMonth} to ${params.endMonth}`);
    console.log(`Resources: ${resources.join(', ')}`);
    console.log(`Destination: ${destination.type} dataset ${CHESS_DATASET}`);

    const createSource = deps.createSource ?? createChessSource;
    const source = createSource({
      ...params,
      client: deps.client ?? new ChessComClient({ retry: deps.retry }),
      delayMs: deps.delayMs,
      now,
    });

    const info = await pipeline.run(source.withResources(...resources));
    for (const line of formatLoadInfo(info)) {
      console.log(line);
    }
    return info;
  } catch (err) {
    console.error('chess_load_failed', err);
    throw err;
  }
};

export const loadChessSample = (deps: ChessLoaderDeps = {}) => {
  const month = previousMonth((deps.now ?? (() => new Date()))());
  console.log(`Loading sample chess data (magnuscarlsen games from ${month})...`);
  return loadChess(
    ['players_profiles', 'players_games', 'players_online_status'],
    { players: ['magnuscarlsen'], startMonth: month, endMonth: month },
    deps
  );
};

export const loadAllChess = (deps: ChessLoaderDeps = {}) => {
  console.log('Loading all chess data...');
  const range = monthRangeEndingAt((deps.now ?? (() => new Date()))(), 180);
  return loadChess(
    ['players_profiles', 'players_games', 'players_online_status'],
    { players: ALL_PLAYERS, ...range },
    deps
  );
};

/** Job entry point: everything comes from CHESS_* and HTTP_* variables. */
export const runChessFromEnv = async (deps: ChessLoaderDeps & EnvHandlerDeps = {}) => {
  const env = deps.env ?? process.env;
  await logEnvironment({ env, ...deps.environment });

  try {
    const config = readChessEnv(env);
    const info = await loadChess(
      config.resources,
      { players: config.players, startMonth: config.startMonth, endMonth: config.endMonth },
      { ...deps, retry: deps.retry ?? readHttpEnv(env) }
    );
    console.log('Chess pipeline execution completed successfully!');
    return info;
  } catch (err) {
    console.error('Chess pipeline execution failed:', err instanceof Error ? err.message : err);
    throw err;
  }
};
