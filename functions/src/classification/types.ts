export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens?: number;
  responseFormat?: 'json_object' | 'text';
}

/**
 * Synchronous chat inference plus the reachability probe used by the precondition gate.
 */
export interface InferenceBackend {
  complete(request: ChatRequest, signal?: AbortSignal): Promise<string>;
  isModelAvailable(model: string): Promise<boolean>;
}

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' | 'text' };
}

export function toChatCompletionBody(request: ChatRequest): ChatCompletionBody {
  const body: ChatCompletionBody = {
    model: request.model,
    messages: request.messages,
    temperature: request.temperature,
  };
  if (request.maxTokens !== undefined) {
    body.max_tokens = request.maxTokens;
  }
  if (request.responseFormat) {
    body.response_format = { type: request.responseFormat };
  }
  return body;
}
