import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { ANALYSIS_MODES, type AnalysisMode } from '../models/mode';
import type { RunOutcome } from '../models/run';
import type { RunOptions } from '../pipeline/orchestrator';
import type { ModeStore } from '../services/modeStore';
import type { RunStore } from '../services/runStore';
import type { EventSource } from '../sources/eventSource';
import { createApiKeyValidator } from '../middleware/auth';

const DEFAULT_RUN_LIMIT = 20;
const MAX_RUN_LIMIT = 100;

const ModeBodySchema = z.object({ mode: z.enum(ANALYSIS_MODES) });
const PendingQuerySchema = z.object({ mode: z.enum(ANALYSIS_MODES) });
const RunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_RUN_LIMIT).default(DEFAULT_RUN_LIMIT),
});

export interface ApiDependencies {
  modes: ModeStore;
  runs: RunStore;
  sourceFor: (mode: AnalysisMode) => EventSource;
  runAnalysis: (options?: RunOptions) => Promise<RunOutcome>;
  apiKey?: () => string | undefined;
}

export function httpStatusForOutcome(outcome: RunOutcome): number {
  switch (outcome.state) {
    case 'completed':
    case 'no-events':
      return 200;
    case 'blocked':
      return 409;
    case 'failed':
      return 500;
  }
}

export function createApiApp(deps: ApiDependencies): Express {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());
  app.use(createApiKeyValidator(deps.apiKey));

  app.get('/status', async (req: Request, res: Response): Promise<void> => {
    try {
      const [mode, recent] = await Promise.all([deps.modes.getMode(), deps.runs.listRecent(1)]);
      res.json({
        status: 'healthy',
        mode,
        lastRun: recent[0] ?? null,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.error('[api] Failed to load status', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to load status' });
    }
  });

  app.get('/mode', async (req: Request, res: Response): Promise<void> => {
    try {
      res.json({ mode: await deps.modes.getMode() });
    } catch (error) {
      logger.error('[api] Failed to read mode', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to read mode' });
    }
  });

  app.put('/mode', async (req: Request, res: Response): Promise<void> => {
    const parsed = ModeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: `mode must be one of ${ANALYSIS_MODES.join(', ')}` });
      return;
    }

    try {
      await deps.modes.setMode(parsed.data.mode);
      logger.info(`[api] Analysis mode set to ${parsed.data.mode}`);
      res.json({ mode: parsed.data.mode });
    } catch (error) {
      logger.error('[api] Failed to set mode', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to set mode' });
    }
  });

  app.get('/events/pending', async (req: Request, res: Response): Promise<void> => {
    const parsed = PendingQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: `mode must be one of ${ANALYSIS_MODES.join(', ')}` });
      return;
    }

    try {
      const pending = await deps.sourceFor(parsed.data.mode).count();
      res.json({ mode: parsed.data.mode, pending });
    } catch (error) {
      logger.error('[api] Failed to count pending events', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to count pending events' });
    }
  });

  app.get('/runs', async (req: Request, res: Response): Promise<void> => {
    const parsed = RunsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_RUN_LIMIT}` });
      return;
    }

    try {
      const runs = await deps.runs.listRecent(parsed.data.limit);
      res.json({ runs, count: runs.length });
    } catch (error) {
      logger.error('[api] Failed to list runs', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to list runs' });
    }
  });

  app.get('/runs/:runId', async (req: Request, res: Response): Promise<void> => {
    try {
      const run = await deps.runs.get(req.params.runId);
      if (!run) {
        res.status(404).json({ error: 'Run not found' });
        return;
      }
      res.json(run);
    } catch (error) {
      logger.error('[api] Failed to load run', { runId: req.params.runId, error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to load run' });
    }
  });

  app.post('/runs', async (req: Request, res: Response): Promise<void> => {
    try {
      const outcome = await deps.runAnalysis();
      res.status(httpStatusForOutcome(outcome)).json(outcome);
    } catch (error) {
      logger.error('[api] Run could not start', { error: errorMessage(error) });
      res.status(500).json({ error: 'Run could not start', message: errorMessage(error) });
    }
  });

  return app;
}
