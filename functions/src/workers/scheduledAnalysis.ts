import { loadAnalysisConfig, requireOpenAiKey, type AnalysisConfig } from '../config';
import { OpenAIChatClient } from '../classification/llm';
import { OpenAIBatchRunner } from '../connectors/openAiBatchRunner';
import type { RunOutcome } from '../models/run';
import type { RunOptions } from '../pipeline/orchestrator';
import { FirestoreBatchJobStore } from '../services/batchJobStore';
import { CloudStorageArtifactStore } from '../services/cloudStorageArtifactStore';
import { FirestoreModeStore } from '../services/modeStore';
import { FirestoreRunStore } from '../services/runStore';
import { FirestoreEventSource } from '../sources/firestoreEventSource';
import { AnalysisDependencies, createOrchestrator } from './analysisRun';

/**
 * Production wiring: Firestore, Cloud Storage and OpenAI.
 */
export function createDefaultDependencies(config: AnalysisConfig = loadAnalysisConfig()): AnalysisDependencies {
  const apiKey = requireOpenAiKey(config);
  return {
    config,
    backend: new OpenAIChatClient({
      apiKey,
      baseUrl: config.openAi.baseUrl,
      timeoutMs: config.inferenceTimeoutMs,
    }),
    runner: new OpenAIBatchRunner({
      apiKey,
      baseUrl: config.openAi.baseUrl,
      timeoutMs: config.inferenceTimeoutMs,
    }),
    modes: new FirestoreModeStore(),
    jobs: new FirestoreBatchJobStore(),
    runs: new FirestoreRunStore(),
    artifacts: new CloudStorageArtifactStore(),
    sourceFor: mode => new FirestoreEventSource(mode),
  };
}

export async function runOperationsAnalysis(options?: RunOptions): Promise<RunOutcome> {
  const orchestrator = createOrchestrator(createDefaultDependencies());
  return orchestrator.run(options);
}
