/**
 * Object storage for manifests, per-event results and reports.
 */
export interface ArtifactStore {
  putJson(path: string, value: unknown): Promise<void>;
  putText(path: string, text: string, contentType?: string): Promise<void>;
  getText(path: string): Promise<string | null>;
  delete(path: string): Promise<void>;
}

export const artifactPaths = {
  onDemandResult: (runId: string, eventId: string) => `results/${runId}/on-demand/${encodeURIComponent(eventId)}.json`,
  batchResult: (runId: string, eventId: string) => `results/${runId}/batch/${encodeURIComponent(eventId)}.json`,
  batchManifest: (runId: string) => `batches/${runId}/manifest.jsonl`,
  batchOutput: (runId: string) => `batches/${runId}/output.jsonl`,
  report: (runId: string) => `reports/${runId}/summary.json`,
};
