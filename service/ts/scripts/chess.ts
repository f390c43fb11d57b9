#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { parseMonthOption, readHttpEnv } from '../src/config.js';
import { getDestination } from '../src/destinations/index.js';
import { isCloudRun } from '../src/environment.js';
import { loadAllChess, loadChess, loadChessSample, runChessFromEnv } from '../src/loaders/chess.js';
import { CHESS_RESOURCES } from '../src/sources/chess/settings.js';

const deps = () => ({ retry: readHttpEnv() });

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('chess')
    .command(
      '$0',
      'Run from CHESS_* variables on Cloud Run, otherwise load a small sample',
      () => {},
      async () => {
        if (isCloudRun()) {
          await runChessFromEnv();
        } else {
          await loadChessSample(deps());
        }
      }
    )
    .command('env', 'Run from CHESS_* variables', () => {}, async () => {
      await runChessFromEnv();
    })
    .command('sample', "Load last month's games for one player", () => {}, async () => {
      await loadChessSample(deps());
    })
    .command('all', 'Load every tracked player over the last 180 days', () => {}, async () => {
      await loadAllChess(deps());
    })
    .command(
      'load',
      'Load the chosen resources',
      (cmd) =>
        cmd
          .option('resources', {
            type: 'string',
            array: true,
            choices: CHESS_RESOURCES,
            default: ['players_profiles', 'players_online_status'],
            describe: 'Resources to load',
          })
          .option('players', {
            type: 'string',
            array: true,
            describe: 'Chess.com usernames',
          })
          .option('start-month', {
            type: 'string',
            describe: 'First archive month (YYYY/MM)',
            coerce: parseMonthOption,
          })
          .option('end-month', {
            type: 'string',
            describe: 'Last archive month (YYYY/MM)',
            coerce: parseMonthOption,
          }),
      async (argv) => {
        await loadChess(
          argv.resources,
          { players: argv.players, startMonth: argv.startMonth, endMonth: argv.endMonth },
          deps()
        );
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
