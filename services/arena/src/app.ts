import express, { type ErrorRequestHandler, type Express, type Response } from 'express';
import { ZodError } from 'zod';
import type { ArenaConfig } from './config.js';
import { applyMove, chooseMove, playMatch, playSeries, type FlowDeps } from './flows/play.js';

function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function sendError(res: Response, route: string, error: unknown): void {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid input', issues: error.issues });
    return;
  }
  console.error(`[arena] ${route} failed`, error);
  res.status(500).json({ error: toErrorMessage(error) });
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

// Only body-parser errors get here; the routes handle their own.
const handleRequestError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status = statusOf(err);
  if (status >= 500) {
    console.error('[arena] Unhandled request error', err);
  }
  res.status(status).json({ error: toErrorMessage(err) });
};

export function createApp(config: Pick<ArenaConfig, 'maxSeriesGames'>, deps: FlowDeps = {}): Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.post('/move', (req, res) => {
    try {
      res.json(chooseMove(req.body, deps));
    } catch (e) {
      sendError(res, '/move', e);
    }
  });

  app.post('/apply', (req, res) => {
    try {
      const result = applyMove(req.body);
      if (!result.ok) {
        res.status(409).json({ error: 'Illegal move', reason: result.reason });
        return;
      }
      res.json(result.output);
    } catch (e) {
      sendError(res, '/apply', e);
    }
  });

  app.post('/play', (req, res) => {
    try {
      res.json(playMatch(req.body, deps));
    } catch (e) {
      sendError(res, '/play', e);
    }
  });

  app.post('/series', (req, res) => {
    try {
      res.json(playSeries(req.body, config.maxSeriesGames, deps));
    } catch (e) {
      sendError(res, '/series', e);
    }
  });

  app.use(handleRequestError);

  return app;
}
