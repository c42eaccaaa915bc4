import assert from 'node:assert/strict';
import test from 'node:test';
import { InferenceRequestError, TransientInferenceError } from '../errors';
import { OpenAIBatchRunner, mapBatchStatus } from './openAiBatchRunner';

interface RecordedCall {
  url: string;
  method: string;
  body: RequestInit['body'];
  contentType: string | null;
}

function stubFetch(responses: Response[], calls: RecordedCall[]): typeof fetch {
  return async (input, init) => {
    const headers = new Headers(init?.headers);
    calls.push({
      url: String(input),
      method: init?.method ?? 'GET',
      body: init?.body,
      contentType: headers.get('Content-Type'),
    });
    const next = responses.shift();
    if (!next) {
      throw new TypeError('fetch failed');
    }
    return next;
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function runner(responses: Response[], calls: RecordedCall[]): OpenAIBatchRunner {
  return new OpenAIBatchRunner({ apiKey: 'test-secret', baseUrl: 'https://llm.test/v1', fetchImpl: stubFetch(responses, calls) });
}

test('mapBatchStatus', async t => {
  await t.test('maps runner statuses onto job statuses', () => {
    assert.equal(mapBatchStatus('validating'), 'submitted');
    assert.equal(mapBatchStatus('in_progress'), 'in-progress');
    assert.equal(mapBatchStatus('finalizing'), 'in-progress');
    assert.equal(mapBatchStatus('completed'), 'completed');
    assert.equal(mapBatchStatus('expired'), 'failed');
    assert.equal(mapBatchStatus('cancelling'), 'stopped');
  });

  await t.test('rejects unknown statuses', () => {
    assert.throws(() => mapBatchStatus('paused'), InferenceRequestError);
  });
});

test('OpenAIBatchRunner', async t => {
  await t.test('uploads the manifest as a batch file', async () => {
    const calls: RecordedCall[] = [];
    const fileId = await runner([jsonResponse({ id: 'file-1', object: 'file' })], calls).uploadManifest('run-1-manifest.jsonl', '{"a":1}\n');

    assert.equal(fileId, 'file-1');
    assert.equal(calls[0].url, 'https://llm.test/v1/files');
    assert.equal(calls[0].method, 'POST');
    assert.equal(calls[0].contentType, null);
    const form = calls[0].body;
    assert.ok(form instanceof FormData);
    assert.equal(form.get('purpose'), 'batch');
    const file = form.get('file');
    assert.ok(file instanceof Blob);
    assert.equal(await file.text(), '{"a":1}\n');
  });

  await t.test('creates a job against the chat completions endpoint', async () => {
    const calls: RecordedCall[] = [];
    const snapshot = await runner([jsonResponse({ id: 'batch-9', status: 'validating' })], calls).createJob('file-1', {
      runId: 'run-1',
      mode: 'cases',
    });

    assert.deepEqual(snapshot, {
      runnerJobId: 'batch-9',
      status: 'submitted',
      outputFileId: null,
      errorFileId: null,
      message: null,
    });
    assert.equal(calls[0].url, 'https://llm.test/v1/batches');
    assert.equal(calls[0].contentType, 'application/json');
    assert.equal(typeof calls[0].body, 'string');
    assert.deepEqual(JSON.parse(String(calls[0].body)), {
      input_file_id: 'file-1',
      endpoint: '/v1/chat/completions',
      completion_window: '24h',
      metadata: { runId: 'run-1', mode: 'cases' },
    });
  });

  await t.test('reads job state with output files and error messages', async () => {
    const calls: RecordedCall[] = [];
    const snapshot = await runner(
      [
        jsonResponse({
          id: 'batch-9',
          status: 'failed',
          output_file_id: null,
          error_file_id: 'file-err',
          errors: { data: [{ message: 'line 3 invalid' }, { message: 'line 7 invalid' }] },
        }),
      ],
      calls,
    ).getJob('batch-9');

    assert.equal(calls[0].url, 'https://llm.test/v1/batches/batch-9');
    assert.equal(calls[0].method, 'GET');
    assert.deepEqual(snapshot, {
      runnerJobId: 'batch-9',
      status: 'failed',
      outputFileId: null,
      errorFileId: 'file-err',
      message: 'line 3 invalid; line 7 invalid',
    });
  });

  await t.test('downloads and deletes files', async () => {
    const calls: RecordedCall[] = [];
    const client = runner([new Response('{"custom_id":"c1"}\n'), jsonResponse({ id: 'file-out', deleted: true })], calls);

    assert.equal(await client.downloadFile('file-out'), '{"custom_id":"c1"}\n');
    await client.deleteFile('file-out');

    assert.deepEqual(
      calls.map(call => `${call.method} ${call.url}`),
      ['GET https://llm.test/v1/files/file-out/content', 'DELETE https://llm.test/v1/files/file-out'],
    );
  });

  await t.test('classifies failures', async () => {
    const calls: RecordedCall[] = [];
    await assert.rejects(runner([jsonResponse({ error: { message: 'busy' } }, 503)], calls).getJob('batch-1'), TransientInferenceError);
    await assert.rejects(runner([jsonResponse({ error: { message: 'bad' } }, 400)], calls).getJob('batch-1'), InferenceRequestError);
    await assert.rejects(runner([], calls).getJob('batch-1'), TransientInferenceError);
    await assert.rejects(runner([jsonResponse({ unexpected: true })], calls).getJob('batch-1'), InferenceRequestError);
  });
});
