import assert from 'node:assert/strict';
import test from 'node:test';
import { JobConflictError, ModelUnavailableError } from '../errors';
import type { BatchJob, BatchJobStatus } from '../models/batchJob';
import { FakeInferenceBackend } from '../testing/fakes';
import { InMemoryBatchJobStore } from '../testing/inMemoryStores';
import { JobTracker, PreconditionGate } from './preconditionGate';

function job(id: string, overrides: Partial<BatchJob> = {}): BatchJob {
  return {
    id,
    runId: `run-${id}`,
    mode: 'cases',
    status: 'in-progress',
    runnerJobId: `runner-${id}`,
    manifestPath: `batches/run-${id}/manifest.jsonl`,
    outputPath: `batches/run-${id}/output.jsonl`,
    inputFileId: null,
    outputFileId: null,
    errorFileId: null,
    eventCount: 100,
    statusMessage: null,
    createdAt: '2026-01-04T06:00:00.000Z',
    updatedAt: '2026-01-04T06:00:00.000Z',
    completedAt: null,
    settledAt: null,
    ...overrides,
  };
}

class RecordingTracker implements JobTracker {
  readonly cleaned: string[] = [];
  private readonly jobs: InMemoryBatchJobStore;
  private readonly next: Map<string, BatchJobStatus>;

  constructor(jobs: InMemoryBatchJobStore, next: Record<string, BatchJobStatus> = {}) {
    this.jobs = jobs;
    this.next = new Map(Object.entries(next));
  }

  async poll(current: BatchJob): Promise<BatchJob> {
    const status = this.next.get(current.id);
    if (!status) {
      return current;
    }
    const updated = { ...current, status };
    await this.jobs.save(updated);
    return updated;
  }

  async cleanup(current: BatchJob): Promise<BatchJob> {
    this.cleaned.push(current.id);
    const settled = { ...current, settledAt: '2026-01-05T06:00:00.000Z' };
    await this.jobs.save(settled);
    return settled;
  }
}

function createGate(jobs: InMemoryBatchJobStore, tracker: JobTracker, backend = new FakeInferenceBackend(() => '')) {
  return new PreconditionGate({
    backend,
    requiredModels: ['light-model', 'heavy-model'],
    jobs,
    tracker,
  });
}

test('PreconditionGate', async t => {
  await t.test('is ready when models are available and no job is outstanding', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('done', { status: 'completed', settledAt: '2026-01-04T07:00:00.000Z' }));

    assert.deepEqual(await createGate(jobs, new RecordingTracker(jobs)).check('cases'), { status: 'ready', completedJob: null });
  });

  await t.test('blocks when a required model is unavailable', async () => {
    const backend = new FakeInferenceBackend(() => '');
    backend.unavailableModels.add('heavy-model');
    const jobs = new InMemoryBatchJobStore();

    const result = await createGate(jobs, new RecordingTracker(jobs), backend).check('cases');
    assert.equal(result.status, 'blocked');
    if (result.status === 'blocked') {
      assert.ok(result.error instanceof ModelUnavailableError);
      assert.equal(result.error.reason, 'model-unavailable');
      assert.deepEqual(result.error.models, ['heavy-model']);
    }
  });

  await t.test('blocks while a job for the same mode is in progress', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('active'));

    const result = await createGate(jobs, new RecordingTracker(jobs)).check('cases');
    assert.equal(result.status, 'blocked');
    if (result.status === 'blocked') {
      assert.ok(result.error instanceof JobConflictError);
      assert.equal(result.error.reason, 'job-in-progress');
      assert.deepEqual(result.error.jobIds, ['active']);
      assert.equal(result.error.message, 'Batch jobs still in progress for mode cases: active');
    }
  });

  await t.test('ignores jobs of the other mode', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('health-job', { mode: 'health' }));

    assert.deepEqual(await createGate(jobs, new RecordingTracker(jobs)).check('cases'), { status: 'ready', completedJob: null });
  });

  await t.test('hands back a job that completed since the last run without settling it', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('stale'));
    const tracker = new RecordingTracker(jobs, { stale: 'completed' });

    const result = await createGate(jobs, tracker).check('cases');

    assert.equal(result.status, 'ready');
    if (result.status === 'ready') {
      assert.equal(result.completedJob?.id, 'stale');
      assert.equal(result.completedJob?.status, 'completed');
    }
    assert.deepEqual(tracker.cleaned, []);
  });

  await t.test('settles failed and stopped jobs left by earlier runs', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('broken', { createdAt: '2026-01-03T06:00:00.000Z' }));
    await jobs.save(job('halted', { createdAt: '2026-01-04T06:00:00.000Z' }));
    const tracker = new RecordingTracker(jobs, { broken: 'failed', halted: 'stopped' });

    const result = await createGate(jobs, tracker).check('cases');

    assert.deepEqual(result, { status: 'ready', completedJob: null });
    assert.deepEqual(tracker.cleaned, ['broken', 'halted']);
    assert.deepEqual(await jobs.listUnsettled('cases'), []);
  });

  await t.test('a job that cannot be refreshed keeps blocking', async () => {
    const jobs = new InMemoryBatchJobStore();
    await jobs.save(job('unknown'));
    const tracker: JobTracker = {
      poll: async () => {
        throw new Error('runner unreachable');
      },
      cleanup: async current => current,
    };

    const result = await createGate(jobs, tracker).check('cases');
    assert.equal(result.status, 'blocked');
  });
});
