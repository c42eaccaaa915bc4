import type { Taxonomy } from '../classification/taxonomy';
import type { HealthEvent, SupportCase } from '../models/eventRecord';
import type { AnalysisConfig } from '../config';

export function supportCase(id: string, overrides: Partial<SupportCase> = {}): SupportCase {
  return {
    kind: 'support-case',
    id,
    timestamp: '2026-01-04T10:00:00.000Z',
    body: `Case ${id}: we are unable to launch more instances.`,
    displayId: `D-${id}`,
    subject: 'Instance limit',
    status: 'resolved',
    serviceCode: 'compute',
    severityCode: 'low',
    submittedBy: 'ops@example.com',
    timeResolved: null,
    ...overrides,
  };
}

export function healthEvent(id: string, overrides: Partial<HealthEvent> = {}): HealthEvent {
  return {
    kind: 'health-event',
    id,
    timestamp: '2026-01-04T08:00:00.000Z',
    body: 'Scheduled maintenance for an instance.',
    eventArn: id,
    service: 'EC2',
    eventTypeCode: 'INSTANCE_REBOOT_MAINTENANCE_SCHEDULED',
    eventTypeCategory: 'scheduledChange',
    region: 'us-east-1',
    statusCode: 'upcoming',
    startTime: '2026-01-04T08:00:00.000Z',
    endTime: null,
    lastUpdatedTime: null,
    affectedEntities: ['i-0abc'],
    ...overrides,
  };
}

export function testTaxonomy(mode: 'cases' | 'health' = 'cases'): Taxonomy {
  return {
    mode,
    fallbackLabel: 'other',
    categories: [
      { label: 'limit-reached', description: 'A service quota was hit.', exemplars: ['Cannot launch more instances'] },
      { label: 'throttling', description: 'API calls were throttled.', exemplars: [] },
      { label: 'other', description: 'Anything else.', exemplars: [] },
    ],
  };
}

export function testConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  return {
    openAi: { apiKey: 'test-secret', baseUrl: 'https://llm.test/v1' },
    models: { analysis: 'light-model', synthesis: 'heavy-model' },
    batchThreshold: 100,
    batchMinRecords: 100,
    workerCount: 4,
    retry: { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 40 },
    inferenceTimeoutMs: 1000,
    batchPollIntervalMs: 60000,
    batchMaxWaitMs: 300000,
    runDeadlineMs: 480000,
    synthesisMaxInputChars: 120000,
    defaultMode: null,
    taxonomyDir: 'unused',
    ...overrides,
  };
}
