import { SupportCase } from '../models/eventRecord';
import { isRecord } from '../utils/json';
import { StoredDocument, readString, readTimestamp } from './fields';

export function normalizeSupportCase(docId: string, data: StoredDocument): SupportCase {
  const id = readString(data, 'caseId') ?? docId.trim();
  if (!id) {
    throw new Error('Support case document has no id');
  }

  const timestamp = readTimestamp(data, 'timeCreated', 'createdAt') ?? new Date(0).toISOString();

  return {
    kind: 'support-case',
    id,
    timestamp,
    body: buildBody(data),
    displayId: readString(data, 'displayId'),
    subject: readString(data, 'subject'),
    status: readString(data, 'status'),
    serviceCode: readString(data, 'serviceCode'),
    severityCode: readString(data, 'severityCode'),
    submittedBy: readString(data, 'submittedBy'),
    timeResolved: readTimestamp(data, 'timeResolved'),
  };
}

// Communications are stored newest first
function buildBody(data: StoredDocument): string {
  const communications = data.communications;
  if (Array.isArray(communications)) {
    const bodies = communications
      .filter(isRecord)
      .map(entry => readString(entry, 'body'))
      .filter((body): body is string => body !== null)
      .reverse();
    if (bodies.length > 0) {
      return bodies.join('\n\n');
    }
  }
  return readString(data, 'body', 'description') ?? '';
}
