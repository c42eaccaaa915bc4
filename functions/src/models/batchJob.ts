import type { AnalysisMode } from './mode';

export type BatchJobStatus = 'building' | 'submitted' | 'in-progress' | 'completed' | 'failed' | 'stopped';

export const TERMINAL_BATCH_STATUSES: readonly BatchJobStatus[] = ['completed', 'failed', 'stopped'];

export interface BatchJob {
  id: string;
  runId: string;
  mode: AnalysisMode;
  status: BatchJobStatus;
  runnerJobId: string | null;
  manifestPath: string;
  outputPath: string;
  inputFileId: string | null;
  outputFileId: string | null;
  errorFileId: string | null;
  eventCount: number;
  statusMessage: string | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
  /** Set once the job's output has been collected or its files removed. */
  settledAt: string | null;
}

export function isTerminalBatchStatus(status: BatchJobStatus): boolean {
  return TERMINAL_BATCH_STATUSES.includes(status);
}
