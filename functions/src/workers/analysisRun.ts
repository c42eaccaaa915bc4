import type { AnalysisConfig } from '../config';
import { EventAnalyzer } from '../classification/eventAnalyzer';
import { Taxonomy, loadTaxonomy } from '../classification/taxonomy';
import type { AnalysisMode } from '../models/mode';
import { BatchJobManager } from '../pipeline/batchJobManager';
import { ModeSelector } from '../pipeline/modeSelector';
import { OnDemandExecutor } from '../pipeline/onDemandExecutor';
import { ModePipeline, Orchestrator } from '../pipeline/orchestrator';
import { OutputAggregator } from '../pipeline/outputAggregator';
import { PreconditionGate } from '../pipeline/preconditionGate';
import type { ArtifactStore } from '../services/artifactStore';
import type { BatchJobStore } from '../services/batchJobStore';
import type { ModeStore } from '../services/modeStore';
import type { RunStore } from '../services/runStore';
import type { InferenceBackend } from '../classification/types';
import type { BatchJobRunner } from '../connectors/types';
import type { EventSource } from '../sources/eventSource';

export interface AnalysisDependencies {
  config: AnalysisConfig;
  backend: InferenceBackend;
  runner: BatchJobRunner;
  modes: ModeStore;
  jobs: BatchJobStore;
  runs: RunStore;
  artifacts: ArtifactStore;
  sourceFor: (mode: AnalysisMode) => EventSource;
  taxonomyFor?: (mode: AnalysisMode) => Taxonomy;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export function createOrchestrator(deps: AnalysisDependencies): Orchestrator {
  const { config } = deps;
  const taxonomies = new Map<AnalysisMode, Taxonomy>();
  const taxonomyFor = deps.taxonomyFor ?? ((mode: AnalysisMode) => loadTaxonomy(mode, config.taxonomyDir));

  const pipelineFor = (mode: AnalysisMode): ModePipeline => {
    let taxonomy = taxonomies.get(mode);
    if (!taxonomy) {
      taxonomy = taxonomyFor(mode);
      taxonomies.set(mode, taxonomy);
    }

    const analyzer = new EventAnalyzer({
      backend: deps.backend,
      taxonomy,
      model: config.models.analysis,
      retry: config.retry,
      now: deps.now,
      sleep: deps.sleep,
    });
    const batch = new BatchJobManager({
      runner: deps.runner,
      jobs: deps.jobs,
      artifacts: deps.artifacts,
      analyzer,
      pollIntervalMs: config.batchPollIntervalMs,
      maxWaitMs: config.batchMaxWaitMs,
      now: deps.now,
      sleep: deps.sleep,
    });

    return {
      gate: new PreconditionGate({
        backend: deps.backend,
        requiredModels: [config.models.analysis, config.models.synthesis],
        jobs: deps.jobs,
        tracker: batch,
      }),
      source: deps.sourceFor(mode),
      executor: new OnDemandExecutor({
        analyzer,
        artifacts: deps.artifacts,
        workerCount: config.workerCount,
      }),
      batch,
      aggregator: new OutputAggregator({
        backend: deps.backend,
        model: config.models.synthesis,
        retry: config.retry,
        artifacts: deps.artifacts,
        maxInputChars: config.synthesisMaxInputChars,
        sleep: deps.sleep,
      }),
    };
  };

  return new Orchestrator({
    modeSelector: new ModeSelector(deps.modes, config.defaultMode),
    pipelineFor,
    runs: deps.runs,
    batchThreshold: config.batchThreshold,
    runDeadlineMs: config.runDeadlineMs,
    now: deps.now,
  });
}
