import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import { loadChess, loadPokemon } from './loaders/index.js';
import { readHttpEnv } from './config.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerRunRoutes } from './routes/runs.js';
import type { PipelineRunners } from './routes/runs.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  // body-parser marks malformed JSON with a 4xx status
  const status = typeof err?.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
  if (status === 500) {
    console.error('unhandled_error', err);
  }
  res.status(status).json(
    status === 500
      ? { error: 'internal_error', message: 'Unexpected error' }
      : { error: 'invalid_request', message: err instanceof Error ? err.message : 'Invalid request' }
  );
};

/** Reads the retry settings once; a bad value throws here instead of failing each run. */
export const createDefaultRunners = (env: NodeJS.ProcessEnv = process.env): PipelineRunners => {
  const retry = readHttpEnv(env);
  return {
    pokemon: (resources, options) => loadPokemon(resources, options, { retry }),
    chess: (resources, options) => loadChess(resources, options, { retry }),
  };
};

export const createApp = (runners: PipelineRunners = createDefaultRunners()): Express => {
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app);
  registerRunRoutes(app, runners);

  app.use(errorHandler);

  return app;
};
