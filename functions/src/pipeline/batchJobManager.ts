import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import type { EventAnalyzer } from '../classification/eventAnalyzer';
import { parseAnalysisReply } from '../classification/eventAnalyzer';
import { toChatCompletionBody } from '../classification/types';
import { FUNCTION_TIMEOUT_MS } from '../config';
import { BATCH_ENDPOINT } from '../connectors/openAiBatchRunner';
import type { BatchJobRunner, RunnerJobSnapshot } from '../connectors/types';
import {
  BatchJobFailureError,
  BatchJobTimeoutError,
  errorMessage,
  errorReason,
} from '../errors';
import type { AnalysisFailure, AnalysisOutcome } from '../models/analysis';
import { BatchJob, isTerminalBatchStatus } from '../models/batchJob';
import type { EventRecord } from '../models/eventRecord';
import type { AnalysisMode } from '../models/mode';
import { ArtifactStore, artifactPaths } from '../services/artifactStore';
import type { BatchJobStore } from '../services/batchJobStore';
import { sleep as defaultSleep, throwIfAborted } from '../utils/async';
import { parseJsonl, toJsonl } from '../utils/json';

const OutputLineSchema = z.object({
  custom_id: z.string(),
  response: z
    .object({
      status_code: z.number(),
      body: z.unknown(),
    })
    .nullable()
    .optional(),
  error: z
    .object({
      code: z.string().nullable().optional(),
      message: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

type OutputLine = z.infer<typeof OutputLineSchema>;

const ManifestLineSchema = z.object({ custom_id: z.string() });

const ResponseBodySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })).min(1),
});

export interface BatchJobManagerOptions {
  runner: BatchJobRunner;
  jobs: BatchJobStore;
  artifacts: ArtifactStore;
  analyzer: Pick<EventAnalyzer, 'buildRequest' | 'taxonomy'>;
  pollIntervalMs: number;
  maxWaitMs: number;
  /** Age after which a job still building without a runner id is given up on. */
  staleBuildMs?: number;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Lifecycle of one external batch job: submit, observe, collect, clean up.
 */
export class BatchJobManager {
  private readonly runner: BatchJobRunner;
  private readonly jobs: BatchJobStore;
  private readonly artifacts: ArtifactStore;
  private readonly analyzer: Pick<EventAnalyzer, 'buildRequest' | 'taxonomy'>;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly staleBuildMs: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: BatchJobManagerOptions) {
    this.runner = options.runner;
    this.jobs = options.jobs;
    this.artifacts = options.artifacts;
    this.analyzer = options.analyzer;
    this.pollIntervalMs = options.pollIntervalMs;
    this.maxWaitMs = options.maxWaitMs;
    this.staleBuildMs = options.staleBuildMs ?? FUNCTION_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async submit(runId: string, mode: AnalysisMode, events: EventRecord[]): Promise<BatchJob> {
    const createdAt = this.now().toISOString();
    let job: BatchJob = {
      id: `${mode}-${runId}`,
      runId,
      mode,
      status: 'building',
      runnerJobId: null,
      manifestPath: artifactPaths.batchManifest(runId),
      outputPath: artifactPaths.batchOutput(runId),
      inputFileId: null,
      outputFileId: null,
      errorFileId: null,
      eventCount: events.length,
      statusMessage: null,
      createdAt,
      updatedAt: createdAt,
      completedAt: null,
      settledAt: null,
    };
    await this.jobs.save(job);

    try {
      const manifest = toJsonl(events.map(event => ({
        custom_id: event.id,
        method: 'POST',
        url: BATCH_ENDPOINT,
        body: toChatCompletionBody(this.analyzer.buildRequest(event)),
      })));
      await this.artifacts.putText(job.manifestPath, manifest, 'application/jsonl');

      const inputFileId = await this.runner.uploadManifest(`${runId}-manifest.jsonl`, manifest);
      job = { ...job, inputFileId };
      const snapshot = await this.runner.createJob(inputFileId, { runId, mode });
      job = this.apply(job, snapshot);
      await this.jobs.save(job);
    } catch (error) {
      await this.cleanup(this.markFailed(job, `Submission failed: ${errorMessage(error)}`));
      throw error;
    }

    logger.info(`[batch] Submitted job ${job.id}`, {
      runId,
      runnerJobId: job.runnerJobId,
      events: events.length,
      status: job.status,
    });
    return job;
  }

  /**
   * One observation of the runner. The record is persisted only when something changed.
   */
  async poll(job: BatchJob): Promise<BatchJob> {
    if (isTerminalBatchStatus(job.status)) {
      return job;
    }
    if (!job.runnerJobId) {
      return this.expireIfStale(job);
    }

    const snapshot = await this.runner.getJob(job.runnerJobId);
    const unchanged = snapshot.status === job.status
      && snapshot.outputFileId === job.outputFileId
      && snapshot.errorFileId === job.errorFileId
      && snapshot.message === job.statusMessage;
    if (unchanged) {
      return job;
    }

    const updated = this.apply(job, snapshot);
    await this.jobs.save(updated);
    logger.info(`[batch] Job ${job.id} is ${updated.status}`, { previous: job.status });
    return updated;
  }

  async awaitCompletion(job: BatchJob, signal?: AbortSignal): Promise<BatchJob> {
    const startedAt = this.now().getTime();
    let current = job;

    for (;;) {
      throwIfAborted(signal);
      current = await this.poll(current);

      if (current.status === 'completed') {
        return current;
      }
      if (current.status === 'failed') {
        await this.cleanup(current);
        throw new BatchJobFailureError(current.id, `Batch job ${current.id} failed: ${current.statusMessage ?? 'no detail'}`);
      }
      if (current.status === 'stopped') {
        await this.cleanup(current);
        throw new BatchJobFailureError(current.id, `Batch job ${current.id} was stopped`, 'batch-job-stopped');
      }

      const waited = this.now().getTime() - startedAt;
      if (waited >= this.maxWaitMs) {
        logger.warn(`[batch] Gave up waiting for job ${current.id}`, { waitedMs: waited, status: current.status });
        throw new BatchJobTimeoutError(current.id, waited);
      }
      await this.sleep(Math.min(this.pollIntervalMs, this.maxWaitMs - waited), signal);
    }
  }

  /**
   * Narrows `pending` to the events the job was submitted with, read back from its manifest.
   * Without a manifest every pending event is a candidate.
   */
  async submittedEvents(job: BatchJob, pending: EventRecord[]): Promise<EventRecord[]> {
    const manifest = await this.artifacts.getText(job.manifestPath);
    if (manifest === null) {
      logger.warn(`[batch] Manifest for job ${job.id} is missing`, { path: job.manifestPath });
      return pending;
    }

    const submitted = new Set<string>();
    for (const record of parseJsonl(manifest).records) {
      const parsed = ManifestLineSchema.safeParse(record);
      if (parsed.success) {
        submitted.add(parsed.data.custom_id);
      }
    }
    return pending.filter(event => submitted.has(event.id));
  }

  /**
   * Demultiplexes runner output back onto the submitted events by custom_id.
   */
  async fetch(job: BatchJob, events: EventRecord[]): Promise<AnalysisOutcome[]> {
    const lines = new Map<string, OutputLine>();
    const rawParts: string[] = [];

    for (const fileId of [job.outputFileId, job.errorFileId]) {
      if (!fileId) {
        continue;
      }
      const text = await this.runner.downloadFile(fileId);
      rawParts.push(text.trimEnd());
      this.collectLines(job, text, lines);
    }
    await this.artifacts.putText(job.outputPath, rawParts.filter(Boolean).join('\n') + '\n', 'application/jsonl');

    const known = new Set(events.map(event => event.id));
    for (const customId of lines.keys()) {
      if (!known.has(customId)) {
        logger.warn(`[batch] Output references unknown event ${customId}`, { jobId: job.id });
      }
    }

    const outcomes: AnalysisOutcome[] = [];
    const analyzedAt = this.now();
    for (const event of events) {
      const line = lines.get(event.id);
      if (!line) {
        outcomes.push(failure(event.id, 'missing-output', 'No output entry for event'));
        continue;
      }

      const content = lineContent(line);
      if (content.status === 'error') {
        outcomes.push(failure(event.id, 'batch-request-failed', content.message));
        continue;
      }

      try {
        const result = parseAnalysisReply(event, content.text, this.analyzer.taxonomy, 'batch', analyzedAt);
        await this.artifacts.putJson(artifactPaths.batchResult(job.runId, event.id), result);
        outcomes.push({ status: 'ok', result });
      } catch (error) {
        outcomes.push(failure(event.id, errorReason(error), errorMessage(error)));
      }
    }

    const failed = outcomes.filter(outcome => outcome.status === 'error').length;
    logger.info(`[batch] Collected output for job ${job.id}`, { events: events.length, failed });
    return outcomes;
  }

  /**
   * Removes the job's intermediate artifacts and runner files, then marks it settled so later
   * runs stop tracking it. Removal is best effort.
   */
  async cleanup(job: BatchJob): Promise<BatchJob> {
    const tasks: Array<[string, () => Promise<void>]> = [
      [job.manifestPath, () => this.artifacts.delete(job.manifestPath)],
      [job.outputPath, () => this.artifacts.delete(job.outputPath)],
    ];
    for (const fileId of [job.inputFileId, job.outputFileId, job.errorFileId]) {
      if (fileId) {
        tasks.push([fileId, () => this.runner.deleteFile(fileId)]);
      }
    }

    for (const [target, task] of tasks) {
      try {
        await task();
      } catch (error) {
        logger.warn(`[batch] Could not remove ${target}`, { jobId: job.id, error: errorMessage(error) });
      }
    }

    const settledAt = this.now().toISOString();
    const settled: BatchJob = { ...job, settledAt, updatedAt: settledAt };
    try {
      await this.jobs.save(settled);
    } catch (error) {
      logger.warn(`[batch] Could not mark job ${job.id} settled`, { error: errorMessage(error) });
    }
    return settled;
  }

  // The invocation that started building is gone once the function timeout has passed
  private async expireIfStale(job: BatchJob): Promise<BatchJob> {
    const age = this.now().getTime() - Date.parse(job.createdAt);
    if (job.status !== 'building' || age < this.staleBuildMs) {
      return job;
    }

    const failed = this.markFailed(job, 'Submission did not complete');
    await this.jobs.save(failed);
    logger.warn(`[batch] Job ${job.id} never left building`, { ageMs: age });
    return failed;
  }

  private markFailed(job: BatchJob, message: string): BatchJob {
    const timestamp = this.now().toISOString();
    return { ...job, status: 'failed', statusMessage: message, updatedAt: timestamp, completedAt: timestamp };
  }

  private collectLines(job: BatchJob, text: string, lines: Map<string, OutputLine>): void {
    const { records, invalidLines } = parseJsonl(text);
    if (invalidLines.length > 0) {
      logger.warn(`[batch] Skipping unparseable output lines`, { jobId: job.id, lines: invalidLines });
    }
    for (const record of records) {
      const parsed = OutputLineSchema.safeParse(record);
      if (!parsed.success) {
        logger.warn(`[batch] Skipping output line without custom_id`, { jobId: job.id });
        continue;
      }
      if (!lines.has(parsed.data.custom_id)) {
        lines.set(parsed.data.custom_id, parsed.data);
      }
    }
  }

  private apply(job: BatchJob, snapshot: RunnerJobSnapshot): BatchJob {
    const updatedAt = this.now().toISOString();
    return {
      ...job,
      status: snapshot.status,
      runnerJobId: snapshot.runnerJobId,
      outputFileId: snapshot.outputFileId,
      errorFileId: snapshot.errorFileId,
      statusMessage: snapshot.message,
      updatedAt,
      completedAt: isTerminalBatchStatus(snapshot.status) ? job.completedAt ?? updatedAt : null,
    };
  }
}

function lineContent(line: OutputLine): { status: 'ok'; text: string } | { status: 'error'; message: string } {
  if (line.error) {
    return { status: 'error', message: line.error.message ?? line.error.code ?? 'Request failed' };
  }
  if (!line.response) {
    return { status: 'error', message: 'Output entry has no response' };
  }
  if (line.response.status_code !== 200) {
    return { status: 'error', message: `Request returned status ${line.response.status_code}` };
  }

  const body = ResponseBodySchema.safeParse(line.response.body);
  const text = body.success ? body.data.choices[0]?.message.content : null;
  if (!text) {
    return { status: 'error', message: 'Response has no message content' };
  }
  return { status: 'ok', text };
}

function failure(eventId: string, reason: string, message: string): AnalysisFailure {
  return { status: 'error', eventId, reason, message, attempts: 1 };
}
