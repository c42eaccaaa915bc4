import * as logger from 'firebase-functions/logger';
import { JobConflictError, ModelUnavailableError, errorMessage } from '../errors';
import type { InferenceBackend } from '../classification/types';
import { BatchJob, isTerminalBatchStatus } from '../models/batchJob';
import type { AnalysisMode } from '../models/mode';
import type { BatchJobStore } from '../services/batchJobStore';

/**
 * `completedJob` is a batch job from an earlier run whose output is ready to be collected.
 */
export type GateResult =
  | { status: 'ready'; completedJob: BatchJob | null }
  | { status: 'blocked'; error: ModelUnavailableError | JobConflictError };

export interface JobTracker {
  poll(job: BatchJob): Promise<BatchJob>;
  cleanup(job: BatchJob): Promise<BatchJob>;
}

export interface PreconditionGateOptions {
  backend: InferenceBackend;
  requiredModels: string[];
  jobs: BatchJobStore;
  tracker: JobTracker;
}

export class PreconditionGate {
  private readonly backend: InferenceBackend;
  private readonly requiredModels: string[];
  private readonly jobs: BatchJobStore;
  private readonly tracker: JobTracker;

  constructor(options: PreconditionGateOptions) {
    this.backend = options.backend;
    this.requiredModels = [...new Set(options.requiredModels)];
    this.jobs = options.jobs;
    this.tracker = options.tracker;
  }

  async check(mode: AnalysisMode): Promise<GateResult> {
    const availability = await Promise.all(
      this.requiredModels.map(async model => ({ model, available: await this.backend.isModelAvailable(model) })),
    );
    const missing = availability.filter(entry => !entry.available).map(entry => entry.model);
    if (missing.length > 0) {
      return { status: 'blocked', error: new ModelUnavailableError(missing) };
    }

    const stillActive: string[] = [];
    let completedJob: BatchJob | null = null;
    for (const job of await this.jobs.listUnsettled(mode)) {
      const refreshed = await this.refresh(job);
      if (!isTerminalBatchStatus(refreshed.status)) {
        stillActive.push(refreshed.id);
      } else if (refreshed.status === 'completed') {
        completedJob = completedJob ?? refreshed;
      } else {
        logger.info(`[gate] Removing files of ${refreshed.status} batch job ${refreshed.id}`);
        await this.tracker.cleanup(refreshed);
      }
    }

    if (stillActive.length > 0) {
      return { status: 'blocked', error: new JobConflictError(mode, stillActive) };
    }
    return { status: 'ready', completedJob };
  }

  // A job whose state cannot be observed keeps blocking
  private async refresh(job: BatchJob): Promise<BatchJob> {
    try {
      return await this.tracker.poll(job);
    } catch (error) {
      logger.warn(`[gate] Could not refresh batch job ${job.id}`, { error: errorMessage(error) });
      return job;
    }
  }
}
