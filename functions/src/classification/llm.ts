import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { InferenceRequestError, TransientInferenceError, errorMessage, isTransientStatus } from '../errors';
import { ChatRequest, InferenceBackend, toChatCompletionBody } from './types';

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
});

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class OpenAIChatClient implements InferenceBackend {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIChatClientOptions) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not set');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(request: ChatRequest, signal?: AbortSignal): Promise<string> {
    const response = await this.send('/chat/completions', {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(toChatCompletionBody(request)),
    }, signal);

    if (!response.ok) {
      throw await toInferenceError(response, `Chat completion with ${request.model} failed`);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceRequestError(`Chat completion with ${request.model} returned an unexpected payload`);
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new InferenceRequestError(`Chat completion with ${request.model} returned empty content`);
    }
    return content;
  }

  async isModelAvailable(model: string): Promise<boolean> {
    try {
      const response = await this.send(`/models/${encodeURIComponent(model)}`, {
        method: 'GET',
        headers: this.headers(),
      });
      if (!response.ok) {
        logger.warn(`[inference] Model ${model} is not accessible`, { status: response.status });
      }
      return response.ok;
    } catch (error) {
      logger.warn(`[inference] Model ${model} could not be reached`, { error: errorMessage(error) });
      return false;
    }
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  private async send(pathname: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const linked = linkSignals(AbortSignal.timeout(this.timeoutMs), signal);
    try {
      return await this.fetchImpl(`${this.baseUrl}${pathname}`, { ...init, signal: linked.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new TransientInferenceError(`Request to ${pathname} failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      linked.dispose();
    }
  }
}

export async function toInferenceError(response: Response, context: string): Promise<Error> {
  const body = await response.text().catch(() => '');
  const message = `${context}: ${response.status} ${body.slice(0, 500)}`.trim();
  if (isTransientStatus(response.status)) {
    return new TransientInferenceError(message, { status: response.status });
  }
  return new InferenceRequestError(message, { status: response.status });
}

/**
 * Aborts when either signal does. `dispose` detaches from the caller's signal, which outlives
 * the request.
 */
function linkSignals(timeout: AbortSignal, signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  if (!signal) {
    return { signal: timeout, dispose: () => undefined };
  }

  const controller = new AbortController();
  const forward = (source: AbortSignal) => () => controller.abort(source.reason);
  const onCaller = forward(signal);
  const onTimeout = forward(timeout);
  if (signal.aborted) {
    onCaller();
  } else if (timeout.aborted) {
    onTimeout();
  } else {
    signal.addEventListener('abort', onCaller, { once: true });
    timeout.addEventListener('abort', onTimeout, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      signal.removeEventListener('abort', onCaller);
      timeout.removeEventListener('abort', onTimeout);
    },
  };
}
