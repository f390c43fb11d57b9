import { ChessComClient, GameSchema } from '@gamedata/clients';
import { z } from 'zod';

import { defineResource, defineSource } from '../../pipeline/index.js';
import type { ResourceContext, Source } from '../../pipeline/index.js';
import { createPacer, fetchOrSkip } from '../fetching.js';
import type { Sleep } from '../fetching.js';
import { isMonthInRange, monthOfArchiveUrl } from './months.js';
import {
  normalizeArchive,
  normalizeGame,
  normalizeOnlineStatus,
  normalizeProfile,
} from './normalize.js';
import { REQUEST_DELAY_MS } from './settings.js';

export * from './normalize.js';
export * from './settings.js';
export * from './months.js';

export interface ChessSourceParams {
  players: string[];
  startMonth: string;
  endMonth: string;
}

export interface ChessSourceOptions extends ChessSourceParams {
  client?: ChessComClient;
  delayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
}

export const LOADED_ARCHIVES_STATE_KEY = 'loaded_archives';

const LoadedArchivesSchema = z.record(z.string(), z.array(z.string()));

const readLoadedArchives = (context: ResourceContext): Record<string, string[]> => {
  const parsed = LoadedArchivesSchema.safeParse(context.state[LOADED_ARCHIVES_STATE_KEY] ?? {});
  return parsed.success ? parsed.data : {};
};

export const createChessSource = (options: ChessSourceOptions): Source => {
  const client = options.client ?? new ChessComClient();
  const delayMs = options.delayMs ?? REQUEST_DELAY_MS;
  const now = options.now ?? (() => new Date());
  const players = [...new Set(options.players.map((player) => player.trim().toLowerCase()))].filter(
    Boolean
  );
  const { startMonth, endMonth } = options;

  async function* playersProfiles() {
    const pace = createPacer(delayMs, options.sleep);
    for (const username of players) {
      await pace();
      const profile = await fetchOrSkip('chess_profile_fetch_failed', { username }, () =>
        client.getPlayerProfile(username)
      );
      if (profile) yield normalizeProfile(profile);
    }
  }

  async function* playersOnlineStatus() {
    const pace = createPacer(delayMs, options.sleep);
    for (const username of players) {
      await pace();
      const status = await fetchOrSkip('chess_online_status_fetch_failed', { username }, () =>
        client.getOnlineStatus(username)
      );
      if (status) yield normalizeOnlineStatus(username, status, now());
    }
  }

  async function* playersArchives() {
    const pace = createPacer(delayMs, options.sleep);
    for (const username of players) {
      await pace();
      const list = await fetchOrSkip('chess_archives_fetch_failed', { username }, () =>
        client.getPlayerArchives(username)
      );
      if (!list) continue;
      for (const url of list.archives) {
        const record = normalizeArchive(username, url);
        if (record) yield record;
      }
    }
  }

  /**
   * Archives already loaded by an earlier run are skipped. The player's most
   * recent archive is never recorded as loaded, so it is fetched again in full
   * on the first run after a newer month appears.
   */
  async function* playersGames(context: ResourceContext) {
    const pace = createPacer(delayMs, options.sleep);
    const loaded = readLoadedArchives(context);

    for (const username of players) {
      await pace();
      const list = await fetchOrSkip('chess_archives_fetch_failed', { username }, () =>
        client.getPlayerArchives(username)
      );
      if (!list) continue;

      const latest = list.archives.at(-1);
      const done = new Set(loaded[username] ?? []);

      for (const url of list.archives) {
        const month = monthOfArchiveUrl(url);
        if (!month || !isMonthInRange(month, startMonth, endMonth)) continue;
        if (done.has(url) && url !== latest) continue;

        await pace();
        const archive = await fetchOrSkip('chess_games_fetch_failed', { username, month }, () =>
          client.getMonthlyArchive(url)
        );
        if (!archive) continue;

        for (const candidate of archive.games) {
          const game = GameSchema.safeParse(candidate);
          if (!game.success) {
            console.warn('chess_game_skipped', { username, month, issues: game.error.issues });
            continue;
          }
          yield normalizeGame(username, month, game.data);
        }
        // the latest archive is still growing
        if (url !== latest) done.add(url);
      }

      loaded[username] = [...done];
      context.state[LOADED_ARCHIVES_STATE_KEY] = { ...loaded };
    }
  }

  return defineSource('chess', [
    defineResource('players_profiles', playersProfiles, { writeDisposition: 'replace' }),
    defineResource('players_games', playersGames, {
      writeDisposition: 'merge',
      primaryKey: ['username', 'game_id'],
    }),
    defineResource('players_online_status', playersOnlineStatus, { writeDisposition: 'append' }),
    defineResource('players_archives', playersArchives, { writeDisposition: 'replace' }),
  ]);
};
