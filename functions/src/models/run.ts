import type { AggregateSummary, AnalysisOutcome, ProcessingPath } from './analysis';
import type { BatchJob } from './batchJob';
import type { EventRecord } from './eventRecord';
import type { AnalysisMode } from './mode';

export type RunState =
  | 'init'
  | 'mode-resolved'
  | 'preconditions-checked'
  | 'routed'
  | 'on-demand-running'
  | 'batch-running'
  | 'aggregating'
  | 'completed'
  | 'failed'
  | 'blocked'
  | 'no-events';

export type TerminalRunState = Extract<RunState, 'completed' | 'failed' | 'blocked' | 'no-events'>;

export type RouteDecision = 'no-events' | ProcessingPath;

export interface RunTransition {
  state: RunState;
  at: string;
}

export interface RunContext {
  runId: string;
  state: RunState;
  mode: AnalysisMode | null;
  eventCount: number;
  events: EventRecord[];
  route: RouteDecision | null;
  batchJob: BatchJob | null;
  outcomes: AnalysisOutcome[];
  summary: AggregateSummary | null;
  reportPath: string | null;
  transitions: RunTransition[];
}

export interface RunTimestamps {
  startedAt: string;
  finishedAt: string | null;
  states: Partial<Record<RunState, string>>;
}

/**
 * Monitoring record persisted once per run.
 */
export interface RunOutcome {
  runId: string;
  mode: AnalysisMode | null;
  state: TerminalRunState;
  status: string;
  reason: string | null;
  eventsTotal: number;
  events: string[];
  path: ProcessingPath | null;
  resultCount: number;
  errorCount: number;
  batchJobId: string | null;
  reportPath: string | null;
  timestamps: RunTimestamps;
}

export const RUN_STATUS = {
  completed: 'analysis completed',
  noEvents: 'no events were found to process',
  modelUnavailable: 'execution stopped: inference models not enabled',
  jobInProgress: 'execution stopped: batch inference jobs in progress',
} as const;

export function failedStatus(reason: string): string {
  return `execution failed: ${reason}`;
}
