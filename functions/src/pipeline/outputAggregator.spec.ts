import assert from 'node:assert/strict';
import test from 'node:test';
import { SynthesisFailureError } from '../errors';
import type { AnalysisResult } from '../models/analysis';
import { artifactPaths } from '../services/artifactStore';
import { FakeInferenceBackend, synthesisReply, transientFailure } from '../testing/fakes';
import { InMemoryArtifactStore } from '../testing/inMemoryStores';
import { OutputAggregator, chunkBlocks, serializeResult } from './outputAggregator';

function result(eventId: string): AnalysisResult {
  return {
    eventId,
    mode: 'cases',
    fields: { caseId: eventId },
    category: 'limit-reached',
    category_explanation: 'Quota exhausted',
    summary: 'Customer hit a service quota.',
    sentiment: 'Negative',
    suggested_action: 'Request a quota increase.',
    suggestion_link: '',
    path: 'on-demand',
    analyzedAt: '2026-01-05T06:30:00.000Z',
  };
}

function createAggregator(backend: FakeInferenceBackend, artifacts: InMemoryArtifactStore, maxInputChars = 120000) {
  return new OutputAggregator({
    backend,
    model: 'heavy-model',
    retry: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1 },
    artifacts,
    maxInputChars,
    sleep: async () => undefined,
  });
}

test('serializeResult and chunkBlocks', async t => {
  await t.test('serializes id, category, sentiment and summary', () => {
    assert.equal(
      serializeResult(result('c0')),
      'event: c0:\ncategory: limit-reached\nsentiment: Negative\nCustomer hit a service quota.',
    );
  });

  await t.test('chunks on block boundaries within the budget', () => {
    assert.deepEqual(chunkBlocks(['aaaa', 'bbbb', 'cc'], 10), ['aaaa\n\nbbbb', 'cc']);
    assert.deepEqual(chunkBlocks(['abcdefghijkl'], 5), ['abcde']);
  });
});

test('OutputAggregator', async t => {
  await t.test('synthesizes and persists exactly a summary and a plan', async () => {
    const backend = new FakeInferenceBackend(() => synthesisReply('Quota pressure dominates.', ['Add quota alarms', ' Review limits ']));
    const artifacts = new InMemoryArtifactStore();

    const summary = await createAggregator(backend, artifacts).aggregate('run-1', 'cases', [result('c0'), result('c1')]);

    assert.deepEqual(summary, { summary: 'Quota pressure dominates.', plan: ['Add quota alarms', 'Review limits'] });
    assert.deepEqual(artifacts.readJson(artifactPaths.report('run-1')), summary);
    assert.equal(backend.requests.length, 1);
    assert.equal(backend.requests[0].model, 'heavy-model');
    assert.equal(backend.requests[0].temperature, 0.3);
    assert.ok(backend.requests[0].messages[1].content.includes('event: c1:'));
  });

  await t.test('aggregating the same results twice rewrites an identical report', async () => {
    const backend = new FakeInferenceBackend(() => synthesisReply('Quota pressure dominates.', ['Add quota alarms']));
    const artifacts = new InMemoryArtifactStore();
    const aggregator = createAggregator(backend, artifacts);
    const results = [result('c0'), result('c1')];

    const first = await aggregator.aggregate('run-1', 'cases', results);
    const stored = artifacts.objects.get(artifactPaths.report('run-1'));
    const second = await aggregator.aggregate('run-1', 'cases', results);

    assert.deepEqual(Object.keys(first), ['summary', 'plan']);
    assert.deepEqual(second, first);
    assert.equal(artifacts.objects.get(artifactPaths.report('run-1')), stored);
    assert.deepEqual([...artifacts.objects.keys()], [artifactPaths.report('run-1')]);
    assert.equal(backend.requests[1].messages[1].content, backend.requests[0].messages[1].content);
  });

  await t.test('wraps a single plan string in a list', async () => {
    const backend = new FakeInferenceBackend(() => JSON.stringify({ summary: 'Fine.', plan: 'Keep going' }));
    const summary = await createAggregator(backend, new InMemoryArtifactStore()).aggregate('run-1', 'health', [result('h0')]);
    assert.deepEqual(summary, { summary: 'Fine.', plan: ['Keep going'] });
  });

  await t.test('condenses oversized input chunk by chunk before the final synthesis', async () => {
    const backend = new FakeInferenceBackend(request => (request.responseFormat === 'text' ? 'theme' : synthesisReply()));
    const results = [result('c0'), result('c1'), result('c2')];

    await createAggregator(backend, new InMemoryArtifactStore(), 120).aggregate('run-1', 'cases', results);

    assert.deepEqual(backend.requests.map(request => request.responseFormat), ['text', 'text', 'text', 'json_object']);
    assert.equal(backend.requests[3].messages[1].content, 'Analyzed support cases:\n\ntheme\n\ntheme\n\ntheme');
  });

  await t.test('exhausted retries are synthesis failures and write no report', async () => {
    const backend = new FakeInferenceBackend(() => {
      throw transientFailure();
    });
    const artifacts = new InMemoryArtifactStore();

    await assert.rejects(
      createAggregator(backend, artifacts).aggregate('run-1', 'cases', [result('c0')]),
      (error: unknown) => error instanceof SynthesisFailureError && error.reason === 'synthesis-failed',
    );
    assert.equal(backend.requests.length, 2);
    assert.equal(artifacts.objects.size, 0);
  });

  await t.test('rejects replies without a summary and plan', async () => {
    const backend = new FakeInferenceBackend(() => JSON.stringify({ overview: 'n/a' }));
    await assert.rejects(
      createAggregator(backend, new InMemoryArtifactStore()).aggregate('run-1', 'cases', [result('c0')]),
      SynthesisFailureError,
    );
  });

  await t.test('refuses to aggregate nothing', async () => {
    const backend = new FakeInferenceBackend(() => synthesisReply());
    await assert.rejects(
      createAggregator(backend, new InMemoryArtifactStore()).aggregate('run-1', 'cases', []),
      SynthesisFailureError,
    );
    assert.equal(backend.requests.length, 0);
  });
});
