import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import { buildAggregateMessages, buildCondenseMessages } from '../classification/prompts';
import type { ChatMessage, InferenceBackend } from '../classification/types';
import { RetrySettings, SYNTHESIS_TEMPERATURE } from '../config';
import { RunCancelledError, SynthesisFailureError, errorMessage, isTransientError } from '../errors';
import type { AggregateSummary, AnalysisResult } from '../models/analysis';
import type { AnalysisMode } from '../models/mode';
import { ArtifactStore, artifactPaths } from '../services/artifactStore';
import { retryWithBackoff } from '../utils/async';
import { extractJsonObject } from '../utils/json';

const MAX_CONDENSE_ROUNDS = 5;

const SynthesisReplySchema = z.object({
  summary: z.string().min(1),
  plan: z.union([
    z.array(z.string()),
    z.string().transform(plan => [plan]),
  ]),
});

export interface OutputAggregatorOptions {
  backend: InferenceBackend;
  model: string;
  retry: RetrySettings;
  artifacts: ArtifactStore;
  maxInputChars: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function serializeResult(result: AnalysisResult): string {
  return [
    `event: ${result.eventId}:`,
    `category: ${result.category}`,
    `sentiment: ${result.sentiment}`,
    result.summary,
  ].join('\n');
}

/**
 * Groups blocks into chunks no longer than maxChars, breaking only between blocks.
 * A single oversized block is truncated to fit.
 */
export function chunkBlocks(blocks: string[], maxChars: number, separator = '\n\n'): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const raw of blocks) {
    const block = raw.length > maxChars ? raw.slice(0, maxChars) : raw;
    if (!current) {
      current = block;
    } else if (current.length + separator.length + block.length <= maxChars) {
      current += separator + block;
    } else {
      chunks.push(current);
      current = block;
    }
  }
  if (current) {
    chunks.push(current);
  }
  return chunks;
}

export class OutputAggregator {
  private readonly backend: InferenceBackend;
  private readonly model: string;
  private readonly retry: RetrySettings;
  private readonly artifacts: ArtifactStore;
  private readonly maxInputChars: number;
  private readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: OutputAggregatorOptions) {
    this.backend = options.backend;
    this.model = options.model;
    this.retry = options.retry;
    this.artifacts = options.artifacts;
    this.maxInputChars = options.maxInputChars;
    this.sleep = options.sleep;
  }

  async aggregate(runId: string, mode: AnalysisMode, results: AnalysisResult[], signal?: AbortSignal): Promise<AggregateSummary> {
    if (results.length === 0) {
      throw new SynthesisFailureError('No analysis results to aggregate');
    }

    const text = await this.fitToBudget(mode, results.map(serializeResult), signal);
    const summary = await this.synthesize(mode, text, signal);

    await this.artifacts.putJson(artifactPaths.report(runId), summary);
    logger.info(`[aggregate] Wrote summary for ${results.length} results`, { runId, planSteps: summary.plan.length });
    return summary;
  }

  private async fitToBudget(mode: AnalysisMode, blocks: string[], signal?: AbortSignal): Promise<string> {
    let current = blocks;
    for (let round = 1; round <= MAX_CONDENSE_ROUNDS; round += 1) {
      const joined = current.join('\n\n');
      if (joined.length <= this.maxInputChars) {
        return joined;
      }

      const chunks = chunkBlocks(current, this.maxInputChars);
      logger.info(`[aggregate] Condensing ${chunks.length} chunks`, { round, chars: joined.length });
      const condensed: string[] = [];
      for (const chunk of chunks) {
        condensed.push((await this.call(buildCondenseMessages(mode, chunk), 'text', signal)).trim());
      }
      current = condensed;
    }

    const joined = current.join('\n\n');
    return joined.length <= this.maxInputChars ? joined : joined.slice(0, this.maxInputChars);
  }

  private async synthesize(mode: AnalysisMode, text: string, signal?: AbortSignal): Promise<AggregateSummary> {
    const reply = await this.call(buildAggregateMessages(mode, text), 'json_object', signal);
    const parsed = SynthesisReplySchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
      throw new SynthesisFailureError('Synthesis reply is not a summary and plan');
    }
    return {
      summary: parsed.data.summary.trim(),
      plan: parsed.data.plan.map(step => step.trim()).filter(Boolean),
    };
  }

  private async call(messages: ChatMessage[], responseFormat: 'json_object' | 'text', signal?: AbortSignal): Promise<string> {
    try {
      return await retryWithBackoff(
        () => this.backend.complete({
          model: this.model,
          messages,
          temperature: SYNTHESIS_TEMPERATURE,
          responseFormat,
        }, signal),
        {
          ...this.retry,
          signal,
          sleep: this.sleep,
          retryIf: isTransientError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn('[aggregate] Retrying synthesis call', { attempt, delayMs, error: errorMessage(error) });
          },
        },
      );
    } catch (error) {
      if (error instanceof RunCancelledError || signal?.aborted) {
        throw error;
      }
      throw new SynthesisFailureError(`Synthesis with ${this.model} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
