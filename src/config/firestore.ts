import * as admin from 'firebase-admin';
import { Firestore } from 'firebase-admin/firestore';

let firestore: Firestore | null = null;

/**
 * Returns the Firestore client, initializing Firebase Admin on first use
 */
export function getDb(): Firestore {
  if (!firestore) {
    if (!admin.apps.length) {
      admin.initializeApp();
    }
    firestore = admin.firestore();
  }
  return firestore;
}

// Collection names
export const COLLECTIONS = {
  QUERIES: 'queries',
  QUERY_CACHE: 'queryCache',
  BILLS: 'bills',
} as const;
