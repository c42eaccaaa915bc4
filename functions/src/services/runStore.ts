import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { admin, firestore } from '../firebase/admin';
import { ANALYSIS_MODES } from '../models/mode';
import type { RunOutcome } from '../models/run';

const RunOutcomeSchema = z.object({
  runId: z.string(),
  mode: z.enum(ANALYSIS_MODES).nullable(),
  state: z.enum(['completed', 'failed', 'blocked', 'no-events']),
  status: z.string(),
  reason: z.string().nullable(),
  eventsTotal: z.number(),
  events: z.array(z.string()),
  path: z.enum(['on-demand', 'batch']).nullable(),
  resultCount: z.number(),
  errorCount: z.number(),
  batchJobId: z.string().nullable(),
  reportPath: z.string().nullable(),
  timestamps: z.object({
    startedAt: z.string(),
    finishedAt: z.string().nullable(),
    states: z.record(z.string()),
  }),
});

export interface RunStore {
  save(outcome: RunOutcome): Promise<void>;
  get(runId: string): Promise<RunOutcome | null>;
  /** Most recent first. */
  listRecent(limit: number): Promise<RunOutcome[]>;
}

export function parseRunOutcome(data: unknown): RunOutcome | null {
  const parsed = RunOutcomeSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export class FirestoreRunStore implements RunStore {
  private readonly db: admin.firestore.Firestore;

  constructor(db?: admin.firestore.Firestore) {
    this.db = db ?? firestore;
  }

  async save(outcome: RunOutcome): Promise<void> {
    await this.collection().doc(outcome.runId).set({ ...outcome });
  }

  async get(runId: string): Promise<RunOutcome | null> {
    const snapshot = await this.collection().doc(runId).get();
    if (!snapshot.exists) {
      return null;
    }
    return this.toOutcome(snapshot.id, snapshot.data());
  }

  async listRecent(limit: number): Promise<RunOutcome[]> {
    const snapshot = await this.collection()
      .orderBy('timestamps.startedAt', 'desc')
      .limit(limit)
      .get();

    const outcomes: RunOutcome[] = [];
    for (const doc of snapshot.docs) {
      const outcome = this.toOutcome(doc.id, doc.data());
      if (outcome) {
        outcomes.push(outcome);
      }
    }
    return outcomes;
  }

  private toOutcome(docId: string, data: unknown): RunOutcome | null {
    const outcome = parseRunOutcome(data);
    if (!outcome) {
      logger.warn(`[runs] Ignoring malformed run record ${docId}`);
    }
    return outcome;
  }

  private collection(): admin.firestore.CollectionReference {
    return this.db.collection('analysisRuns');
  }
}
