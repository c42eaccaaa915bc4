import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { ANALYSIS_MODES, type AnalysisMode } from '../models/mode';
import { validateThreshold } from '../pipeline/volumeRouter';

export const ANALYSIS_TEMPERATURE = 0.5;
export const SYNTHESIS_TEMPERATURE = 0.3;

/** Hard limit Cloud Functions puts on one invocation of the analysis functions. */
export const FUNCTION_TIMEOUT_SECONDS = 540;
export const FUNCTION_TIMEOUT_MS = FUNCTION_TIMEOUT_SECONDS * 1000;

const DEFAULT_TAXONOMY_DIR = path.resolve(__dirname, '..', '..', 'taxonomy');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  ANALYSIS_MODEL: z.string().min(1).default('gpt-4o-mini'),
  SYNTHESIS_MODEL: z.string().min(1).default('gpt-4o'),
  ANALYSIS_BATCH_THRESHOLD: positiveInt(100),
  BATCH_MIN_RECORDS: positiveInt(100),
  ANALYSIS_WORKER_COUNT: positiveInt(4),
  INFERENCE_MAX_ATTEMPTS: positiveInt(5),
  INFERENCE_INITIAL_DELAY_MS: positiveInt(1000),
  INFERENCE_MAX_DELAY_MS: positiveInt(30000),
  INFERENCE_TIMEOUT_MS: positiveInt(60000),
  BATCH_POLL_INTERVAL_MS: positiveInt(30000),
  BATCH_MAX_WAIT_MS: positiveInt(300000),
  RUN_DEADLINE_MS: positiveInt(480000),
  SYNTHESIS_MAX_INPUT_CHARS: positiveInt(120000),
  ANALYSIS_DEFAULT_MODE: z.enum(ANALYSIS_MODES).optional(),
  TAXONOMY_DIR: z.string().min(1).default(DEFAULT_TAXONOMY_DIR),
});

export interface RetrySettings {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export interface AnalysisConfig {
  openAi: {
    apiKey: string | null;
    baseUrl: string;
  };
  models: {
    analysis: string;
    synthesis: string;
  };
  batchThreshold: number;
  batchMinRecords: number;
  workerCount: number;
  retry: RetrySettings;
  inferenceTimeoutMs: number;
  batchPollIntervalMs: number;
  batchMaxWaitMs: number;
  runDeadlineMs: number;
  synthesisMaxInputChars: number;
  defaultMode: AnalysisMode | null;
  taxonomyDir: string;
}

type EnvSource = Record<string, string | undefined>;

export function loadAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid analysis configuration (${issues.join('; ')})`, issues);
  }

  const values = parsed.data;
  validateThreshold(values.ANALYSIS_BATCH_THRESHOLD, values.BATCH_MIN_RECORDS);

  if (values.INFERENCE_INITIAL_DELAY_MS > values.INFERENCE_MAX_DELAY_MS) {
    throw new ConfigurationError('INFERENCE_INITIAL_DELAY_MS must not exceed INFERENCE_MAX_DELAY_MS');
  }
  // A run still going when the function is killed never records its outcome
  if (values.RUN_DEADLINE_MS >= FUNCTION_TIMEOUT_MS) {
    throw new ConfigurationError(`RUN_DEADLINE_MS must be below the ${FUNCTION_TIMEOUT_SECONDS}s function timeout`);
  }
  if (values.BATCH_MAX_WAIT_MS >= values.RUN_DEADLINE_MS) {
    throw new ConfigurationError('BATCH_MAX_WAIT_MS must be below RUN_DEADLINE_MS');
  }

  return Object.freeze({
    openAi: {
      apiKey: values.OPENAI_API_KEY ?? null,
      baseUrl: values.OPENAI_BASE_URL.replace(/\/+$/, ''),
    },
    models: {
      analysis: values.ANALYSIS_MODEL,
      synthesis: values.SYNTHESIS_MODEL,
    },
    batchThreshold: values.ANALYSIS_BATCH_THRESHOLD,
    batchMinRecords: values.BATCH_MIN_RECORDS,
    workerCount: values.ANALYSIS_WORKER_COUNT,
    retry: {
      maxAttempts: values.INFERENCE_MAX_ATTEMPTS,
      initialDelayMs: values.INFERENCE_INITIAL_DELAY_MS,
      maxDelayMs: values.INFERENCE_MAX_DELAY_MS,
    },
    inferenceTimeoutMs: values.INFERENCE_TIMEOUT_MS,
    batchPollIntervalMs: values.BATCH_POLL_INTERVAL_MS,
    batchMaxWaitMs: values.BATCH_MAX_WAIT_MS,
    runDeadlineMs: values.RUN_DEADLINE_MS,
    synthesisMaxInputChars: values.SYNTHESIS_MAX_INPUT_CHARS,
    defaultMode: values.ANALYSIS_DEFAULT_MODE ?? null,
    taxonomyDir: values.TAXONOMY_DIR,
  });
}

export function requireOpenAiKey(config: AnalysisConfig): string {
  if (!config.openAi.apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is not set');
  }
  return config.openAi.apiKey;
}

// Firebase leaves unset params as empty strings
function blankToUndefined(env: EnvSource): EnvSource {
  const result: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return result;
}
