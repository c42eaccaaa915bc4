import assert from 'node:assert/strict';
import test from 'node:test';
import { InferenceRequestError } from '../errors';
import { FakeInferenceBackend, analysisReply, transientFailure } from '../testing/fakes';
import { supportCase, testTaxonomy } from '../testing/fixtures';
import { EventAnalyzer, normalizeSentiment, parseAnalysisReply } from './eventAnalyzer';

const NOW = new Date('2026-01-05T06:30:00.000Z');
const RETRY = { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 40 };

function createAnalyzer(backend: FakeInferenceBackend): EventAnalyzer {
  return new EventAnalyzer({
    backend,
    taxonomy: testTaxonomy(),
    model: 'light-model',
    retry: RETRY,
    now: () => NOW,
    sleep: async () => undefined,
  });
}

test('EventAnalyzer', async t => {
  await t.test('builds a JSON request for the light model', () => {
    const analyzer = createAnalyzer(new FakeInferenceBackend(() => analysisReply()));
    const request = analyzer.buildRequest(supportCase('c1'));

    assert.equal(request.model, 'light-model');
    assert.equal(request.temperature, 0.5);
    assert.equal(request.responseFormat, 'json_object');
    assert.equal(request.messages[0].role, 'system');
    assert.ok(request.messages[0].content.includes('1. limit-reached'));
    assert.ok(request.messages[1].content.includes('caseId: c1'));
  });

  await t.test('returns a result carrying the identifying fields', async () => {
    const analyzer = createAnalyzer(new FakeInferenceBackend(() => analysisReply()));
    const outcome = await analyzer.analyzeOutcome(supportCase('c1'));

    assert.equal(outcome.status, 'ok');
    if (outcome.status !== 'ok') {
      return;
    }
    assert.deepEqual(outcome.result, {
      eventId: 'c1',
      mode: 'cases',
      fields: {
        caseId: 'c1',
        displayId: 'D-c1',
        status: 'resolved',
        serviceCode: 'compute',
        timeCreated: '2026-01-04T10:00:00.000Z',
        timeResolved: null,
        submittedBy: 'ops@example.com',
      },
      category: 'limit-reached',
      category_explanation: 'Quota exhausted',
      summary: 'Customer hit a service quota.',
      sentiment: 'Negative',
      suggested_action: 'Request a quota increase.',
      suggestion_link: 'https://docs.example.com/quotas',
      path: 'on-demand',
      analyzedAt: '2026-01-05T06:30:00.000Z',
    });
  });

  await t.test('maps unknown categories onto the fallback label', async () => {
    const analyzer = createAnalyzer(new FakeInferenceBackend(() => analysisReply({ category: 'billing dispute' })));
    const outcome = await analyzer.analyzeOutcome(supportCase('c2'));
    assert.equal(outcome.status, 'ok');
    if (outcome.status === 'ok') {
      assert.equal(outcome.result.category, 'other');
    }
  });

  await t.test('retries transient failures', async () => {
    const backend = new FakeInferenceBackend((_request, call) => {
      if (call === 1) {
        throw transientFailure();
      }
      return analysisReply();
    });
    const outcome = await createAnalyzer(backend).analyzeOutcome(supportCase('c3'));

    assert.equal(outcome.status, 'ok');
    assert.equal(backend.requests.length, 2);
  });

  await t.test('reports exhaustion as an error entry', async () => {
    const backend = new FakeInferenceBackend(() => {
      throw transientFailure();
    });
    const outcome = await createAnalyzer(backend).analyzeOutcome(supportCase('c4'));

    assert.deepEqual(outcome, {
      status: 'error',
      eventId: 'c4',
      reason: 'transient-inference-failure',
      message: 'Gave up after 3 attempts: rate limited',
      attempts: 3,
    });
  });

  await t.test('does not retry programming errors', async () => {
    const backend = new FakeInferenceBackend(() => {
      throw new TypeError('Cannot read properties of undefined');
    });
    const outcome = await createAnalyzer(backend).analyzeOutcome(supportCase('c6'));

    assert.deepEqual(outcome, {
      status: 'error',
      eventId: 'c6',
      reason: 'unexpected-error',
      message: 'Cannot read properties of undefined',
      attempts: 1,
    });
    assert.equal(backend.requests.length, 1);
  });

  await t.test('does not retry malformed replies', async () => {
    const backend = new FakeInferenceBackend(() => 'I cannot help with that');
    const outcome = await createAnalyzer(backend).analyzeOutcome(supportCase('c5'));

    assert.equal(outcome.status, 'error');
    assert.equal(backend.requests.length, 1);
    if (outcome.status === 'error') {
      assert.equal(outcome.reason, 'inference-request-failed');
      assert.equal(outcome.attempts, 1);
    }
  });
});

test('parseAnalysisReply', async t => {
  await t.test('accepts fenced replies and alternate field names', () => {
    const content = [
      'Here is the analysis:',
      '```json',
      JSON.stringify({
        category: 'Throttling',
        event_summary: ' API calls throttled. ',
        sentiment: 'positive',
        suggestion_action: 'Add jitter.',
      }),
      '```',
    ].join('\n');

    const result = parseAnalysisReply(supportCase('c6'), content, testTaxonomy(), 'batch', NOW);

    assert.equal(result.category, 'throttling');
    assert.equal(result.summary, 'API calls throttled.');
    assert.equal(result.sentiment, 'Positive');
    assert.equal(result.suggested_action, 'Add jitter.');
    assert.equal(result.suggestion_link, '');
    assert.equal(result.category_explanation, '');
    assert.equal(result.path, 'batch');
  });

  await t.test('rejects replies without a summary', () => {
    assert.throws(
      () => parseAnalysisReply(supportCase('c7'), JSON.stringify({ category: 'throttling' }), testTaxonomy(), 'batch'),
      InferenceRequestError,
    );
  });

  await t.test('unknown sentiments become Neutral', () => {
    assert.equal(normalizeSentiment('furious'), 'Neutral');
    assert.equal(normalizeSentiment(undefined), 'Neutral');
    assert.equal(normalizeSentiment(' NEGATIVE '), 'Negative');
  });
});
