import * as admin from 'firebase-admin';

let adminDb: admin.firestore.Firestore | undefined;

/**
 * Firestore with the operator's application default credentials.
 */
export function getAdminDb(): admin.firestore.Firestore {
  if (!adminDb) {
    // Initialize Firebase if not already initialized
    if (admin.apps.length === 0) {
      admin.initializeApp({
        credential: admin.credential.applicationDefault()
      });
    }
    adminDb = admin.firestore();
  }
  return adminDb;
}
