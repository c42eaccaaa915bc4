import * as functions from 'firebase-functions/v1';
import * as logger from 'firebase-functions/logger';
import type { Request, Response } from 'express';
import { createApiApp, httpStatusForOutcome } from './api/routes';
import { FUNCTION_TIMEOUT_SECONDS } from './config';
import { errorMessage } from './errors';
import { FirestoreModeStore } from './services/modeStore';
import { FirestoreRunStore } from './services/runStore';
import { FirestoreEventSource } from './sources/firestoreEventSource';
import { runOperationsAnalysis as executeRun } from './workers/scheduledAnalysis';

const SCHEDULE_TIME_ZONE = 'UTC';

const RUNTIME_OPTIONS: functions.RuntimeOptions = {
  timeoutSeconds: FUNCTION_TIMEOUT_SECONDS,
  memory: '512MB',
  secrets: ['OPENAI_API_KEY'],
};

export const runOperationsAnalysis = functions
  .runWith(RUNTIME_OPTIONS)
  .pubsub
  .schedule('0 6 * * *')
  .timeZone(SCHEDULE_TIME_ZONE)
  .onRun(async () => {
    try {
      const outcome = await executeRun();
      logger.info(`[scheduler] ${outcome.status}`, { runId: outcome.runId, state: outcome.state });
    } catch (error) {
      logger.error('[scheduler] Run could not start', { error: errorMessage(error) });
    }
    return null;
  });

export const triggerOperationsAnalysis = functions
  .runWith(RUNTIME_OPTIONS)
  .https.onRequest(async (req: Request, res: Response) => {
    try {
      const outcome = await executeRun();
      res.status(httpStatusForOutcome(outcome)).json(outcome);
    } catch (error) {
      logger.error('[trigger] Run could not start', { error: errorMessage(error) });
      res.status(500).json({ error: 'Run could not start', message: errorMessage(error) });
    }
  });

export const api = functions
  .runWith({ secrets: ['OPENAI_API_KEY', 'API_KEY'], timeoutSeconds: FUNCTION_TIMEOUT_SECONDS })
  .https.onRequest(createApiApp({
    modes: new FirestoreModeStore(),
    runs: new FirestoreRunStore(),
    sourceFor: mode => new FirestoreEventSource(mode),
    runAnalysis: options => executeRun(options),
  }));
