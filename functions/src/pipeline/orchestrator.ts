import { randomUUID } from 'crypto';
import * as logger from 'firebase-functions/logger';
import { ModelUnavailableError, RunCancelledError, errorMessage, errorReason } from '../errors';
import { AnalysisOutcome, successfulResults } from '../models/analysis';
import type { BatchJob } from '../models/batchJob';
import type { EventRecord } from '../models/eventRecord';
import type { AnalysisMode } from '../models/mode';
import {
  RUN_STATUS,
  RunContext,
  RunOutcome,
  RunState,
  TerminalRunState,
  failedStatus,
} from '../models/run';
import { artifactPaths } from '../services/artifactStore';
import type { RunStore } from '../services/runStore';
import type { EventSource } from '../sources/eventSource';
import { throwIfAborted } from '../utils/async';
import type { BatchJobManager } from './batchJobManager';
import type { ModeSelector } from './modeSelector';
import type { OnDemandExecutor } from './onDemandExecutor';
import type { OutputAggregator } from './outputAggregator';
import type { PreconditionGate } from './preconditionGate';
import { route } from './volumeRouter';

/**
 * Everything a run needs once its mode is known.
 */
export interface ModePipeline {
  gate: Pick<PreconditionGate, 'check'>;
  source: EventSource;
  executor: Pick<OnDemandExecutor, 'run'>;
  batch: Pick<BatchJobManager, 'submit' | 'awaitCompletion' | 'submittedEvents' | 'fetch' | 'cleanup'>;
  aggregator: Pick<OutputAggregator, 'aggregate'>;
}

export interface OrchestratorOptions {
  modeSelector: Pick<ModeSelector, 'resolve'>;
  pipelineFor: (mode: AnalysisMode) => ModePipeline;
  runs: RunStore;
  batchThreshold: number;
  runDeadlineMs: number;
  now?: () => Date;
  newRunId?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
  deadlineMs?: number;
  runId?: string;
}

const ALLOWED_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  init: ['mode-resolved', 'failed'],
  'mode-resolved': ['preconditions-checked', 'blocked', 'failed'],
  'preconditions-checked': ['routed', 'failed'],
  routed: ['on-demand-running', 'batch-running', 'no-events', 'failed'],
  'on-demand-running': ['aggregating', 'failed'],
  'batch-running': ['aggregating', 'failed'],
  aggregating: ['completed', 'failed'],
  completed: [],
  failed: [],
  blocked: [],
  'no-events': [],
};

class RunFailure extends Error {
  readonly reason: string;

  constructor(reason: string, message: string) {
    super(message);
    this.name = 'RunFailure';
    this.reason = reason;
  }
}

export class Orchestrator {
  private readonly modeSelector: Pick<ModeSelector, 'resolve'>;
  private readonly pipelineFor: (mode: AnalysisMode) => ModePipeline;
  private readonly runs: RunStore;
  private readonly batchThreshold: number;
  private readonly runDeadlineMs: number;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(options: OrchestratorOptions) {
    this.modeSelector = options.modeSelector;
    this.pipelineFor = options.pipelineFor;
    this.runs = options.runs;
    this.batchThreshold = options.batchThreshold;
    this.runDeadlineMs = options.runDeadlineMs;
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? defaultRunId;
  }

  /**
   * Executes one run from init to a terminal state. Never throws; failures end in the failed state.
   */
  async run(options: RunOptions = {}): Promise<RunOutcome> {
    const runId = options.runId ?? this.newRunId();
    const startedAt = this.now().toISOString();
    const ctx: RunContext = {
      runId,
      state: 'init',
      mode: null,
      eventCount: 0,
      events: [],
      route: null,
      batchJob: null,
      outcomes: [],
      summary: null,
      reportPath: null,
      transitions: [{ state: 'init', at: startedAt }],
    };

    const controller = new AbortController();
    const deadlineMs = options.deadlineMs ?? this.runDeadlineMs;
    const deadline = setTimeout(() => controller.abort(new RunCancelledError('deadline-exceeded')), deadlineMs);
    const onExternalAbort = () => controller.abort(new RunCancelledError('cancelled'));
    if (options.signal?.aborted) {
      onExternalAbort();
    } else {
      options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    logger.info('[orchestrator] Run started', { runId, deadlineMs });

    let terminal: { state: TerminalRunState; status: string; reason: string | null };
    try {
      terminal = await this.execute(ctx, controller.signal);
    } catch (error) {
      const reason = error instanceof RunFailure ? error.reason : errorReason(error);
      logger.error('[orchestrator] Run failed', { runId, state: ctx.state, reason, error: errorMessage(error) });
      terminal = { state: 'failed', status: failedStatus(reason), reason };
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }

    this.transition(ctx, terminal.state);
    const outcome = this.toOutcome(ctx, terminal.state, terminal.status, terminal.reason, startedAt);
    try {
      await this.runs.save(outcome);
    } catch (error) {
      logger.error('[orchestrator] Failed to persist run outcome', { runId, error: errorMessage(error) });
    }

    logger.info(`[orchestrator] Run finished: ${outcome.status}`, {
      runId,
      state: outcome.state,
      events: outcome.eventsTotal,
      results: outcome.resultCount,
      errors: outcome.errorCount,
    });
    return outcome;
  }

  private async execute(
    ctx: RunContext,
    signal: AbortSignal,
  ): Promise<{ state: TerminalRunState; status: string; reason: string | null }> {
    const mode = await this.modeSelector.resolve();
    ctx.mode = mode;
    this.transition(ctx, 'mode-resolved');

    const pipeline = this.pipelineFor(mode);
    const gate = await pipeline.gate.check(mode);
    if (gate.status === 'blocked') {
      const { error } = gate;
      logger.warn(`[orchestrator] Run blocked: ${error.message}`, { runId: ctx.runId, mode });
      const status = error instanceof ModelUnavailableError ? RUN_STATUS.modelUnavailable : RUN_STATUS.jobInProgress;
      return { state: 'blocked', status, reason: error.reason };
    }
    this.transition(ctx, 'preconditions-checked');
    throwIfAborted(signal);

    let events = dedupeEvents(ctx.runId, await pipeline.source.list());
    let collecting: BatchJob | null = null;
    if (gate.completedJob) {
      const submitted = await pipeline.batch.submittedEvents(gate.completedJob, events);
      if (submitted.length > 0) {
        collecting = gate.completedJob;
        events = submitted;
      } else {
        logger.warn(`[orchestrator] No pending events left for completed batch job ${gate.completedJob.id}`, { runId: ctx.runId });
        await pipeline.batch.cleanup(gate.completedJob);
      }
    }

    ctx.events = events;
    ctx.eventCount = events.length;
    ctx.route = collecting ? 'batch' : route(events.length, this.batchThreshold);
    this.transition(ctx, 'routed');

    if (ctx.route === 'no-events') {
      return { state: 'no-events', status: RUN_STATUS.noEvents, reason: null };
    }

    if (ctx.route === 'on-demand') {
      this.transition(ctx, 'on-demand-running');
      ctx.outcomes = await pipeline.executor.run(ctx.runId, events, signal);
      throwIfAborted(signal);
    } else {
      this.transition(ctx, 'batch-running');
      if (collecting) {
        logger.info(`[orchestrator] Collecting batch job ${collecting.id} submitted by run ${collecting.runId}`, {
          runId: ctx.runId,
          events: events.length,
        });
        ctx.batchJob = collecting;
      } else {
        ctx.batchJob = await pipeline.batch.submit(ctx.runId, mode, events);
        ctx.batchJob = await pipeline.batch.awaitCompletion(ctx.batchJob, signal);
      }
      ctx.outcomes = await pipeline.batch.fetch(ctx.batchJob, events);
    }

    const results = successfulResults(ctx.outcomes);
    if (results.length === 0) {
      // Settled so its events are submitted again
      if (ctx.batchJob) {
        await pipeline.batch.cleanup(ctx.batchJob);
      }
      throw new RunFailure('no-analysis-results', `None of the ${events.length} events produced an analysis result`);
    }

    this.transition(ctx, 'aggregating');
    ctx.summary = await pipeline.aggregator.aggregate(ctx.runId, mode, results, signal);
    ctx.reportPath = artifactPaths.report(ctx.runId);

    try {
      await pipeline.source.markProcessed(results.map(result => result.eventId));
    } catch (error) {
      logger.error('[orchestrator] Could not mark events processed; they will be analyzed again', {
        runId: ctx.runId,
        error: errorMessage(error),
      });
    }
    if (ctx.batchJob) {
      await pipeline.batch.cleanup(ctx.batchJob);
    }

    return { state: 'completed', status: RUN_STATUS.completed, reason: null };
  }

  private transition(ctx: RunContext, next: RunState): void {
    if (!ALLOWED_TRANSITIONS[ctx.state].includes(next)) {
      throw new Error(`Illegal run transition ${ctx.state} -> ${next}`);
    }
    logger.debug(`[orchestrator] ${ctx.state} -> ${next}`, { runId: ctx.runId });
    ctx.state = next;
    ctx.transitions.push({ state: next, at: this.now().toISOString() });
  }

  private toOutcome(
    ctx: RunContext,
    state: TerminalRunState,
    status: string,
    reason: string | null,
    startedAt: string,
  ): RunOutcome {
    const states: Partial<Record<RunState, string>> = {};
    for (const transition of ctx.transitions) {
      states[transition.state] = transition.at;
    }

    return {
      runId: ctx.runId,
      mode: ctx.mode,
      state,
      status,
      reason,
      eventsTotal: ctx.eventCount,
      events: ctx.events.map(event => event.id),
      path: ctx.route === 'on-demand' || ctx.route === 'batch' ? ctx.route : null,
      resultCount: countOutcomes(ctx.outcomes, 'ok'),
      errorCount: countOutcomes(ctx.outcomes, 'error'),
      batchJobId: ctx.batchJob?.id ?? null,
      reportPath: state === 'completed' ? ctx.reportPath : null,
      timestamps: {
        startedAt,
        finishedAt: this.now().toISOString(),
        states,
      },
    };
  }
}

function dedupeEvents(runId: string, events: EventRecord[]): EventRecord[] {
  const seen = new Set<string>();
  const unique: EventRecord[] = [];
  const duplicates: string[] = [];
  for (const event of events) {
    if (seen.has(event.id)) {
      duplicates.push(event.id);
      continue;
    }
    seen.add(event.id);
    unique.push(event);
  }
  if (duplicates.length > 0) {
    logger.warn('[orchestrator] Dropping duplicate events', { runId, duplicates });
  }
  return unique;
}

function countOutcomes(outcomes: AnalysisOutcome[], status: AnalysisOutcome['status']): number {
  return outcomes.filter(outcome => outcome.status === status).length;
}

function defaultRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:]/g, '').replace(/\..+$/, '');
  return `${stamp}-${randomUUID().slice(0, 8)}`;
}
