import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { ANALYSIS_TEMPERATURE, RetrySettings } from '../config';
import { InferenceRequestError, errorMessage, errorReason, isTransientError } from '../errors';
import { AnalysisOutcome, AnalysisResult, ProcessingPath, SENTIMENTS, Sentiment } from '../models/analysis';
import { EventRecord, identifyingFields, modeForEvent } from '../models/eventRecord';
import { RetryExhaustedError, retryWithBackoff } from '../utils/async';
import { extractJsonObject } from '../utils/json';
import { buildAnalysisMessages } from './prompts';
import { Taxonomy, normalizeCategory } from './taxonomy';
import { ChatRequest, InferenceBackend } from './types';

const AnalysisReplySchema = z.object({
  category: z.unknown().optional(),
  category_explanation: z.string().default(''),
  event_summary: z.string().optional(),
  summary: z.string().optional(),
  sentiment: z.unknown().optional(),
  suggested_action: z.string().optional(),
  suggestion_action: z.string().optional(),
  suggestion_link: z.string().default(''),
});

export interface EventAnalyzerOptions {
  backend: InferenceBackend;
  taxonomy: Taxonomy;
  model: string;
  retry: RetrySettings;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Per-event analysis against the light model.
 */
export class EventAnalyzer {
  private readonly backend: InferenceBackend;
  readonly taxonomy: Taxonomy;
  private readonly model: string;
  private readonly retry: RetrySettings;
  private readonly now: () => Date;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: EventAnalyzerOptions) {
    this.backend = options.backend;
    this.taxonomy = options.taxonomy;
    this.model = options.model;
    this.retry = options.retry;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep;
  }

  buildRequest(event: EventRecord): ChatRequest {
    return {
      model: this.model,
      messages: buildAnalysisMessages(this.taxonomy.mode, this.taxonomy, event),
      temperature: ANALYSIS_TEMPERATURE,
      responseFormat: 'json_object',
    };
  }

  /**
   * Analyzes one event. Failures come back as an error entry carrying the attempt count;
   * cancellation is still thrown.
   */
  async analyzeOutcome(event: EventRecord, signal?: AbortSignal): Promise<AnalysisOutcome> {
    const request = this.buildRequest(event);
    let attempts = 0;

    try {
      const result = await retryWithBackoff(
        async attempt => {
          attempts = attempt;
          const content = await this.backend.complete(request, signal);
          return parseAnalysisReply(event, content, this.taxonomy, 'on-demand', this.now());
        },
        {
          ...this.retry,
          signal,
          sleep: this.sleep,
          retryIf: isTransientError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(`[analyzer] Retrying event ${event.id}`, { attempt, delayMs, error: errorMessage(error) });
          },
        },
      );
      return { status: 'ok', result };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      logger.error(`[analyzer] Failed to analyze event ${event.id}`, { attempts, error: errorMessage(error) });
      return {
        status: 'error',
        eventId: event.id,
        reason: errorReason(cause),
        message: errorMessage(error),
        attempts,
      };
    }
  }
}

/**
 * Turns a model reply into an AnalysisResult. Shared by the on-demand and batch paths.
 */
export function parseAnalysisReply(
  event: EventRecord,
  content: string,
  taxonomy: Taxonomy,
  path: ProcessingPath,
  analyzedAt: Date = new Date(),
): AnalysisResult {
  const json = extractJsonObject(content);
  if (!json) {
    throw new InferenceRequestError(`Reply for event ${event.id} is not a JSON object`);
  }

  const parsed = AnalysisReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new InferenceRequestError(`Reply for event ${event.id} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const reply = parsed.data;
  const summary = (reply.event_summary ?? reply.summary ?? '').trim();
  if (!summary) {
    throw new InferenceRequestError(`Reply for event ${event.id} has no summary`);
  }

  const category = normalizeCategory(taxonomy, reply.category);
  if (!category.matched) {
    logger.warn(`[analyzer] Unknown category for event ${event.id}`, {
      returned: reply.category,
      fallback: category.label,
    });
  }

  return {
    eventId: event.id,
    mode: modeForEvent(event),
    fields: identifyingFields(event),
    category: category.label,
    category_explanation: reply.category_explanation.trim(),
    summary,
    sentiment: normalizeSentiment(reply.sentiment),
    suggested_action: (reply.suggested_action ?? reply.suggestion_action ?? '').trim(),
    suggestion_link: reply.suggestion_link.trim(),
    path,
    analyzedAt: analyzedAt.toISOString(),
  };
}

export function normalizeSentiment(raw: unknown): Sentiment {
  if (typeof raw === 'string') {
    const match = SENTIMENTS.find(sentiment => sentiment.toLowerCase() === raw.trim().toLowerCase());
    if (match) {
      return match;
    }
  }
  return 'Neutral';
}
