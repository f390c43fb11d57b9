import type { Express } from 'express';
import { z } from 'zod';
import { isMonth } from '@gamedata/clients';

import { ConfigError } from '../config.js';
import { UnknownResourceError } from '../pipeline/index.js';
import type { LoadInfo } from '../pipeline/index.js';
import { CHESS_RESOURCES } from '../sources/chess/settings.js';
import { POKEMON_RESOURCES } from '../sources/pokemon/settings.js';
import type { ChessLoadOptions } from '../loaders/chess.js';
import type { PokemonLoadOptions } from '../loaders/pokemon.js';

const MonthString = z.string().refine(isMonth, { message: 'expected YYYY/MM' });

const RunCreateSchema = z.discriminatedUnion('pipeline', [
  z.object({
    pipeline: z.literal('pokemon'),
    resources: z.array(z.enum(POKEMON_RESOURCES)).min(1).default(['pokemon_details']),
    pokemon_limit: z.number().int().positive().optional(),
  }),
  z.object({
    pipeline: z.literal('chess'),
    resources: z
      .array(z.enum(CHESS_RESOURCES))
      .min(1)
      .default(['players_profiles', 'players_online_status']),
    players: z.array(z.string().min(1)).min(1).optional(),
    start_month: MonthString.optional(),
    end_month: MonthString.optional(),
  }),
]);

export interface PipelineRunners {
  pokemon: (resources: string[], options: PokemonLoadOptions) => Promise<LoadInfo>;
  chess: (resources: string[], options: ChessLoadOptions) => Promise<LoadInfo>;
}

const toRunResponse = (pipeline: string, info: LoadInfo) => {
  const [loadPackage] = info.loadPackages;
  return {
    pipeline,
    pipeline_name: info.pipelineName,
    destination: info.destinationType,
    dataset: info.datasetName,
    load_id: loadPackage?.loadId ?? null,
    tables: Object.fromEntries(
      Object.entries(loadPackage?.tables ?? {}).map(([name, table]) => [name, table.rowCount])
    ),
    started_at: info.startedAt.toISOString(),
    finished_at: info.finishedAt.toISOString(),
  };
};

export const registerRunRoutes = (app: Express, runners: PipelineRunners) => {
  app.post('/v1/runs', async (req, res) => {
    const parsed = RunCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
      return;
    }

    const body = parsed.data;
    try {
      const info =
        body.pipeline === 'pokemon'
          ? await runners.pokemon(body.resources, { pokemonLimit: body.pokemon_limit })
          : await runners.chess(body.resources, {
              players: body.players,
              startMonth: body.start_month,
              endMonth: body.end_month,
            });
      res.status(201).send(toRunResponse(body.pipeline, info));
    } catch (err) {
      if (err instanceof UnknownResourceError) {
        res.status(400).send({ error: 'unknown_resource', message: err.message });
        return;
      }
      if (err instanceof ConfigError) {
        res.status(400).send({ error: 'invalid_configuration', message: err.message });
        return;
      }
      console.error('pipeline_run_error', { pipeline: body.pipeline, error: err });
      res.status(500).send({
        error: 'run_failed',
        message: err instanceof Error ? err.message : 'Unexpected error',
      });
    }
  });
};
