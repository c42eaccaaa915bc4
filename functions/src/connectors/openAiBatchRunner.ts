import { z } from 'zod';
import { InferenceRequestError, TransientInferenceError, errorMessage } from '../errors';
import { toInferenceError } from '../classification/llm';
import type { BatchJobStatus } from '../models/batchJob';
import type { BatchJobRunner, RunnerJobSnapshot } from './types';

export const BATCH_ENDPOINT = '/v1/chat/completions';
const COMPLETION_WINDOW = '24h';

const FileObjectSchema = z.object({ id: z.string() });

const BatchObjectSchema = z.object({
  id: z.string(),
  status: z.string(),
  output_file_id: z.string().nullable().optional(),
  error_file_id: z.string().nullable().optional(),
  errors: z
    .object({
      data: z.array(z.object({ message: z.string().optional() })).optional(),
    })
    .nullable()
    .optional(),
});

type BatchObject = z.infer<typeof BatchObjectSchema>;

const STATUS_MAP: Record<string, BatchJobStatus> = {
  validating: 'submitted',
  in_progress: 'in-progress',
  finalizing: 'in-progress',
  completed: 'completed',
  failed: 'failed',
  expired: 'failed',
  cancelling: 'stopped',
  cancelled: 'stopped',
};

export function mapBatchStatus(status: string): BatchJobStatus {
  const mapped = STATUS_MAP[status];
  if (!mapped) {
    throw new InferenceRequestError(`Unknown batch status ${status}`);
  }
  return mapped;
}

export interface OpenAIBatchRunnerOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class OpenAIBatchRunner implements BatchJobRunner {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIBatchRunnerOptions) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not set');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async uploadManifest(fileName: string, jsonl: string): Promise<string> {
    const form = new FormData();
    form.append('purpose', 'batch');
    form.append('file', new Blob([jsonl], { type: 'application/jsonl' }), fileName);

    const response = await this.request('POST', '/files', form);
    const parsed = FileObjectSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceRequestError('File upload returned an unexpected payload');
    }
    return parsed.data.id;
  }

  async createJob(inputFileId: string, metadata: Record<string, string>): Promise<RunnerJobSnapshot> {
    const response = await this.request('POST', '/batches', JSON.stringify({
      input_file_id: inputFileId,
      endpoint: BATCH_ENDPOINT,
      completion_window: COMPLETION_WINDOW,
      metadata,
    }));
    return toSnapshot(await this.parseBatch(response));
  }

  async getJob(runnerJobId: string): Promise<RunnerJobSnapshot> {
    const response = await this.request('GET', `/batches/${encodeURIComponent(runnerJobId)}`);
    return toSnapshot(await this.parseBatch(response));
  }

  async downloadFile(fileId: string): Promise<string> {
    const response = await this.request('GET', `/files/${encodeURIComponent(fileId)}/content`);
    return response.text();
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.request('DELETE', `/files/${encodeURIComponent(fileId)}`);
  }

  private async parseBatch(response: Response): Promise<BatchObject> {
    const parsed = BatchObjectSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceRequestError('Batch endpoint returned an unexpected payload');
    }
    return parsed.data;
  }

  private async request(method: 'GET' | 'POST' | 'DELETE', pathname: string, body?: string | FormData): Promise<Response> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
    if (typeof body === 'string') {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new TransientInferenceError(`Request to ${pathname} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw await toInferenceError(response, `${method} ${pathname} failed`);
    }
    return response;
  }
}

function toSnapshot(batch: BatchObject): RunnerJobSnapshot {
  const messages = (batch.errors?.data ?? [])
    .map(entry => entry.message)
    .filter((message): message is string => Boolean(message));

  return {
    runnerJobId: batch.id,
    status: mapBatchStatus(batch.status),
    outputFileId: batch.output_file_id ?? null,
    errorFileId: batch.error_file_id ?? null,
    message: messages.length > 0 ? messages.join('; ') : null,
  };
}
