import * as logger from 'firebase-functions/logger';
import type { EventAnalyzer } from '../classification/eventAnalyzer';
import { RunCancelledError, errorMessage, errorReason } from '../errors';
import type { AnalysisFailure, AnalysisOutcome } from '../models/analysis';
import type { EventRecord } from '../models/eventRecord';
import { ArtifactStore, artifactPaths } from '../services/artifactStore';
import { mapWithConcurrency } from '../utils/async';

export interface OnDemandExecutorOptions {
  analyzer: Pick<EventAnalyzer, 'analyzeOutcome'>;
  artifacts: ArtifactStore;
  workerCount: number;
}

export class OnDemandExecutor {
  private readonly analyzer: Pick<EventAnalyzer, 'analyzeOutcome'>;
  private readonly artifacts: ArtifactStore;
  private readonly workerCount: number;

  constructor(options: OnDemandExecutorOptions) {
    this.analyzer = options.analyzer;
    this.artifacts = options.artifacts;
    this.workerCount = options.workerCount;
  }

  /**
   * Analyzes every event with bounded parallelism. One outcome per event, in input order.
   */
  async run(runId: string, events: EventRecord[], signal?: AbortSignal): Promise<AnalysisOutcome[]> {
    logger.info(`[on-demand] Analyzing ${events.length} events`, { runId, workers: this.workerCount });

    const outcomes = await mapWithConcurrency(
      events,
      event => this.process(runId, event, signal),
      {
        concurrency: this.workerCount,
        signal,
        onSkipped: event => cancelledEntry(event.id, 0),
      },
    );

    const failed = outcomes.filter(outcome => outcome.status === 'error').length;
    logger.info(`[on-demand] Finished ${events.length} events`, { runId, succeeded: events.length - failed, failed });
    return outcomes;
  }

  private async process(runId: string, event: EventRecord, signal?: AbortSignal): Promise<AnalysisOutcome> {
    let outcome: AnalysisOutcome;
    try {
      outcome = await this.analyzer.analyzeOutcome(event, signal);
    } catch (error) {
      if (error instanceof RunCancelledError) {
        return cancelledEntry(event.id, 1);
      }
      return {
        status: 'error',
        eventId: event.id,
        reason: errorReason(error),
        message: errorMessage(error),
        attempts: 1,
      };
    }

    if (outcome.status === 'ok') {
      try {
        await this.artifacts.putJson(artifactPaths.onDemandResult(runId, event.id), outcome.result);
      } catch (error) {
        logger.error(`[on-demand] Failed to persist result for ${event.id}`, { runId, error: errorMessage(error) });
        return {
          status: 'error',
          eventId: event.id,
          reason: 'persist-failed',
          message: errorMessage(error),
          attempts: 1,
        };
      }
    }
    return outcome;
  }
}

function cancelledEntry(eventId: string, attempts: number): AnalysisFailure {
  return {
    status: 'error',
    eventId,
    reason: 'cancelled',
    message: 'Run was cancelled before the event was analyzed',
    attempts,
  };
}
