import type { AnalysisMode } from './mode';

interface BaseEventRecord {
  id: string;
  timestamp: string;
  body: string;
}

export interface SupportCase extends BaseEventRecord {
  kind: 'support-case';
  displayId: string | null;
  subject: string | null;
  status: string | null;
  serviceCode: string | null;
  severityCode: string | null;
  submittedBy: string | null;
  timeResolved: string | null;
}

export interface HealthEvent extends BaseEventRecord {
  kind: 'health-event';
  eventArn: string;
  service: string | null;
  eventTypeCode: string | null;
  eventTypeCategory: string | null;
  region: string | null;
  statusCode: string | null;
  startTime: string | null;
  endTime: string | null;
  lastUpdatedTime: string | null;
  affectedEntities: string[];
}

export type EventRecord = SupportCase | HealthEvent;

export function modeForEvent(record: EventRecord): AnalysisMode {
  return record.kind === 'support-case' ? 'cases' : 'health';
}

/**
 * Fields carried over verbatim from the source record onto its analysis result.
 */
export function identifyingFields(record: EventRecord): Record<string, string | null> {
  switch (record.kind) {
    case 'support-case':
      return {
        caseId: record.id,
        displayId: record.displayId,
        status: record.status,
        serviceCode: record.serviceCode,
        timeCreated: record.timestamp,
        timeResolved: record.timeResolved,
        submittedBy: record.submittedBy,
      };
    case 'health-event':
      return {
        eventArn: record.eventArn,
        service: record.service,
        eventTypeCode: record.eventTypeCode,
        eventTypeCategory: record.eventTypeCategory,
        region: record.region,
        startTime: record.startTime ?? record.timestamp,
        lastUpdatedTime: record.lastUpdatedTime,
        statusCode: record.statusCode,
      };
  }
}

/**
 * Renders the record as the text block handed to the model.
 */
export function renderEventForPrompt(record: EventRecord): string {
  const fields = identifyingFields(record);
  const lines = Object.entries(fields)
    .filter(([, value]) => value !== null && value !== '')
    .map(([key, value]) => `${key}: ${value}`);

  if (record.kind === 'support-case' && record.subject) {
    lines.push(`subject: ${record.subject}`);
  }
  if (record.kind === 'support-case' && record.severityCode) {
    lines.push(`severityCode: ${record.severityCode}`);
  }
  if (record.kind === 'health-event' && record.affectedEntities.length > 0) {
    lines.push(`affectedEntities: ${record.affectedEntities.join(', ')}`);
  }

  lines.push('', record.body.trim() || 'No description provided.');
  return lines.join('\n');
}
