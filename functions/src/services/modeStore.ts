import { FieldValue } from 'firebase-admin/firestore';
import { admin, firestore } from '../firebase/admin';
import type { AnalysisMode } from '../models/mode';

export interface ModeStore {
  /** Raw persisted value, unvalidated. */
  getMode(): Promise<string | null>;
  setMode(mode: AnalysisMode): Promise<void>;
}

export class FirestoreModeStore implements ModeStore {
  private readonly db: admin.firestore.Firestore;

  constructor(db?: admin.firestore.Firestore) {
    this.db = db ?? firestore;
  }

  async getMode(): Promise<string | null> {
    const snapshot = await this.docRef().get();
    const value: unknown = snapshot.get('value');
    return typeof value === 'string' ? value : null;
  }

  async setMode(mode: AnalysisMode): Promise<void> {
    await this.docRef().set({ value: mode, updatedAt: FieldValue.serverTimestamp() }, { merge: true });
  }

  private docRef(): admin.firestore.DocumentReference {
    return this.db.collection('settings').doc('analysisMode');
  }
}
