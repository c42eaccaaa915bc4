import type { BatchJobStatus } from '../models/batchJob';

export interface RunnerJobSnapshot {
  runnerJobId: string;
  status: BatchJobStatus;
  outputFileId: string | null;
  errorFileId: string | null;
  message: string | null;
}

/**
 * External asynchronous job runner that processes a JSONL manifest of chat requests.
 */
export interface BatchJobRunner {
  uploadManifest(fileName: string, jsonl: string): Promise<string>;
  createJob(inputFileId: string, metadata: Record<string, string>): Promise<RunnerJobSnapshot>;
  getJob(runnerJobId: string): Promise<RunnerJobSnapshot>;
  downloadFile(fileId: string): Promise<string>;
  deleteFile(fileId: string): Promise<void>;
}
