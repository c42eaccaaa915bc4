import { HealthEvent } from '../models/eventRecord';
import { isRecord } from '../utils/json';
import { StoredDocument, readString, readStringList, readTimestamp } from './fields';

export function normalizeHealthEvent(docId: string, data: StoredDocument): HealthEvent {
  const eventArn = readString(data, 'eventArn', 'arn');
  const id = eventArn ?? docId.trim();
  if (!id) {
    throw new Error('Health event document has no id');
  }

  const startTime = readTimestamp(data, 'startTime');
  const lastUpdatedTime = readTimestamp(data, 'lastUpdatedTime');

  return {
    kind: 'health-event',
    id,
    timestamp: startTime ?? lastUpdatedTime ?? new Date(0).toISOString(),
    body: readDescription(data),
    eventArn: eventArn ?? id,
    service: readString(data, 'service'),
    eventTypeCode: readString(data, 'eventTypeCode'),
    eventTypeCategory: readString(data, 'eventTypeCategory'),
    region: readString(data, 'region'),
    statusCode: readString(data, 'statusCode'),
    startTime,
    endTime: readTimestamp(data, 'endTime'),
    lastUpdatedTime,
    affectedEntities: readStringList(data.affectedEntities),
  };
}

function readDescription(data: StoredDocument): string {
  const nested = data.eventDescription;
  if (isRecord(nested)) {
    const latest = readString(nested, 'latestDescription');
    if (latest) {
      return latest;
    }
  }
  return readString(data, 'latestDescription', 'description', 'body') ?? '';
}
