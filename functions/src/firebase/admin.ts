import * as admin from 'firebase-admin';

if (!admin.apps.length) {
  admin.initializeApp();
}

export { admin };
export const firestore = admin.firestore();

export function defaultBucket() {
  return admin.storage().bucket();
}

export type StorageBucket = ReturnType<typeof defaultBucket>;
