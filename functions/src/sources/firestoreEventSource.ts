import * as logger from 'firebase-functions/logger';
import { Timestamp } from 'firebase-admin/firestore';
import { admin, firestore } from '../firebase/admin';
import type { AnalysisMode } from '../models/mode';
import type { EventRecord } from '../models/eventRecord';
import { errorMessage } from '../errors';
import { normalizeHealthEvent } from '../normalizers/healthEventNormalizer';
import { normalizeSupportCase } from '../normalizers/supportCaseNormalizer';
import { StoredDocument } from '../normalizers/fields';
import { EventSource } from './eventSource';

const WRITE_BATCH_LIMIT = 500;

const SOURCE_COLLECTIONS: Record<AnalysisMode, string> = {
  cases: 'supportCases',
  health: 'healthEvents',
};

const NORMALIZERS: Record<AnalysisMode, (docId: string, data: StoredDocument) => EventRecord> = {
  cases: normalizeSupportCase,
  health: normalizeHealthEvent,
};

export class FirestoreEventSource implements EventSource {
  readonly mode: AnalysisMode;
  private readonly db: admin.firestore.Firestore;
  private readonly docIds = new Map<string, string>();

  constructor(mode: AnalysisMode, db?: admin.firestore.Firestore) {
    this.mode = mode;
    this.db = db ?? firestore;
  }

  async count(): Promise<number> {
    const snapshot = await this.pendingQuery().count().get();
    return snapshot.data().count;
  }

  async list(): Promise<EventRecord[]> {
    const snapshot = await this.pendingQuery().get();
    const normalize = NORMALIZERS[this.mode];
    const events: EventRecord[] = [];

    for (const doc of snapshot.docs) {
      try {
        const event = normalize(doc.id, doc.data());
        this.docIds.set(event.id, doc.id);
        events.push(event);
      } catch (error) {
        logger.warn(`[source:${this.mode}] Skipping document ${doc.id}`, { error: errorMessage(error) });
      }
    }

    logger.info(`[source:${this.mode}] Loaded ${events.length} pending events`, {
      documents: snapshot.size,
    });
    return events;
  }

  async markProcessed(eventIds: string[]): Promise<void> {
    const collection = this.db.collection(SOURCE_COLLECTIONS[this.mode]);
    const analyzedAt = Timestamp.now();

    for (let offset = 0; offset < eventIds.length; offset += WRITE_BATCH_LIMIT) {
      const batch = this.db.batch();
      for (const eventId of eventIds.slice(offset, offset + WRITE_BATCH_LIMIT)) {
        const docRef = collection.doc(this.docIds.get(eventId) ?? eventId);
        batch.update(docRef, { analysisState: 'analyzed', analyzedAt });
      }
      await batch.commit();
    }
  }

  private pendingQuery(): admin.firestore.Query {
    return this.db.collection(SOURCE_COLLECTIONS[this.mode]).where('analysisState', '==', 'pending');
  }
}
