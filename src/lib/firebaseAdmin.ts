import admin from 'firebase-admin';
import type { Credential } from 'firebase-admin/app';
import './config.js';

function resolveCredential(): Credential {
  const { FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL, FIREBASE_PRIVATE_KEY } = process.env;
  if (FIREBASE_PROJECT_ID && FIREBASE_CLIENT_EMAIL && FIREBASE_PRIVATE_KEY) {
    return admin.credential.cert({
      projectId: FIREBASE_PROJECT_ID,
      clientEmail: FIREBASE_CLIENT_EMAIL,
      // Handle newline characters in private key
      privateKey: FIREBASE_PRIVATE_KEY.replace(/\\n/g, '\n'),
    });
  }
  // Local development and hosted runtimes with ambient credentials
  return admin.credential.applicationDefault();
}

if (!admin.apps.length) {
  admin.initializeApp({ credential: resolveCredential() });
}

// Firestore holds the append-only order event log
export const db = admin.firestore();

export default admin;
