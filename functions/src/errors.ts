export type PipelineErrorReason =
  | 'configuration-error'
  | 'model-unavailable'
  | 'job-in-progress'
  | 'transient-inference-failure'
  | 'inference-request-failed'
  | 'batch-job-failed'
  | 'batch-job-stopped'
  | 'timeout'
  | 'synthesis-failed'
  | 'cancelled'
  | 'deadline-exceeded';

export class PipelineError extends Error {
  readonly reason: PipelineErrorReason;

  constructor(reason: PipelineErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.reason = reason;
  }
}

export class ConfigurationError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration-error', message);
    this.issues = issues;
  }
}

export class ModelUnavailableError extends PipelineError {
  readonly models: string[];

  constructor(models: string[]) {
    super('model-unavailable', `Inference models not enabled: ${models.join(', ')}`);
    this.models = models;
  }
}

export class JobConflictError extends PipelineError {
  readonly jobIds: string[];

  constructor(mode: string, jobIds: string[]) {
    super('job-in-progress', `Batch jobs still in progress for mode ${mode}: ${jobIds.join(', ')}`);
    this.jobIds = jobIds;
  }
}

export class TransientInferenceError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, options?: { status?: number | null; cause?: unknown }) {
    super('transient-inference-failure', message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

export class InferenceRequestError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, options?: { status?: number | null; cause?: unknown }) {
    super('inference-request-failed', message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

export class BatchJobFailureError extends PipelineError {
  readonly jobId: string;

  constructor(
    jobId: string,
    message: string,
    reason: Extract<PipelineErrorReason, 'batch-job-failed' | 'batch-job-stopped' | 'timeout'> = 'batch-job-failed',
  ) {
    super(reason, message);
    this.jobId = jobId;
  }
}

export class BatchJobTimeoutError extends BatchJobFailureError {
  constructor(jobId: string, waitedMs: number) {
    super(jobId, `Batch job ${jobId} did not finish within ${waitedMs}ms`, 'timeout');
  }
}

export class SynthesisFailureError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('synthesis-failed', message, options);
  }
}

export class RunCancelledError extends PipelineError {
  constructor(reason: Extract<PipelineErrorReason, 'cancelled' | 'deadline-exceeded'> = 'cancelled') {
    super(reason, reason === 'cancelled' ? 'Run was cancelled' : 'Run deadline exceeded');
  }
}

const TRANSIENT_STATUS_CODES = new Set([408, 409, 429, 500, 502, 503, 504]);

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUS_CODES.has(status);
}

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientInferenceError;
}

export function errorReason(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.reason;
  }
  return 'unexpected-error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
