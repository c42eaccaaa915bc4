import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { admin, firestore } from '../firebase/admin';
import type { BatchJob } from '../models/batchJob';
import { ANALYSIS_MODES, type AnalysisMode } from '../models/mode';

const BatchJobSchema = z.object({
  id: z.string(),
  runId: z.string(),
  mode: z.enum(ANALYSIS_MODES),
  status: z.enum(['building', 'submitted', 'in-progress', 'completed', 'failed', 'stopped']),
  runnerJobId: z.string().nullable(),
  manifestPath: z.string(),
  outputPath: z.string(),
  inputFileId: z.string().nullable(),
  outputFileId: z.string().nullable(),
  errorFileId: z.string().nullable(),
  eventCount: z.number().int().nonnegative(),
  statusMessage: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  settledAt: z.string().nullable().default(null),
});

export interface BatchJobStore {
  save(job: BatchJob): Promise<void>;
  get(jobId: string): Promise<BatchJob | null>;
  /** Jobs for the mode that are still running or whose output has not been collected, oldest first. */
  listUnsettled(mode: AnalysisMode): Promise<BatchJob[]>;
}

export function parseBatchJob(data: unknown): BatchJob | null {
  const parsed = BatchJobSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export class FirestoreBatchJobStore implements BatchJobStore {
  private readonly db: admin.firestore.Firestore;

  constructor(db?: admin.firestore.Firestore) {
    this.db = db ?? firestore;
  }

  async save(job: BatchJob): Promise<void> {
    await this.collection().doc(job.id).set({ ...job });
  }

  async get(jobId: string): Promise<BatchJob | null> {
    const snapshot = await this.collection().doc(jobId).get();
    return snapshot.exists ? this.toJob(snapshot.id, snapshot.data()) : null;
  }

  async listUnsettled(mode: AnalysisMode): Promise<BatchJob[]> {
    const snapshot = await this.collection()
      .where('mode', '==', mode)
      .where('settledAt', '==', null)
      .get();

    const jobs: BatchJob[] = [];
    for (const doc of snapshot.docs) {
      const job = this.toJob(doc.id, doc.data());
      if (job) {
        jobs.push(job);
      }
    }
    return jobs.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  private toJob(docId: string, data: unknown): BatchJob | null {
    const job = parseBatchJob(data);
    if (!job) {
      logger.warn(`[batch] Ignoring malformed job record ${docId}`);
    }
    return job;
  }

  private collection(): admin.firestore.CollectionReference {
    return this.db.collection('batchJobs');
  }
}
