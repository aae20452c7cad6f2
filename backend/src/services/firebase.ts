import admin from 'firebase-admin';
import type { Firestore } from 'firebase-admin/firestore';
import { readFileSync } from 'fs';
import type { FirebaseConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import type { AuthUser } from '../types/index.js';

export interface TokenVerifier {
  /** Resolves the user behind an ID token; rejects when the token is invalid or expired. */
  verifyIdToken(token: string): Promise<AuthUser>;
}

export interface FirebaseServices {
  firestore: Firestore;
  verifier: TokenVerifier;
}

// Initialize Firebase Admin SDK
const initializeApp = (config: FirebaseConfig) => {
  if (admin.apps.length > 0) {
    return admin;
  }

  // Prefer environment variables (for deployments)
  if (config.projectId && config.privateKey && config.clientEmail) {
    admin.initializeApp({
      credential: admin.credential.cert({
        projectId: config.projectId,
        privateKey: config.privateKey,
        clientEmail: config.clientEmail,
      }),
    });
  } else if (config.serviceAccountPath) {
    // Fallback to service account JSON file (for local development)
    const serviceAccount = JSON.parse(readFileSync(config.serviceAccountPath, 'utf8'));
    admin.initializeApp({
      credential: admin.credential.cert(serviceAccount),
    });
  } else {
    throw new ConfigError(
      'Firebase credentials missing: set FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL and FIREBASE_PRIVATE_KEY, or FIREBASE_SERVICE_ACCOUNT_PATH'
    );
  }
  return admin;
};

export function initializeFirebase(config: FirebaseConfig): FirebaseServices {
  const firebaseAdmin = initializeApp(config);
  const auth = firebaseAdmin.auth();

  // Initialize Firestore with explicit settings
  const firestore = firebaseAdmin.firestore();
  firestore.settings({
    ignoreUndefinedProperties: true,
    preferRest: true, // Use REST API instead of gRPC to avoid connection issues
  });

  return {
    firestore,
    verifier: {
      async verifyIdToken(token) {
        const decodedToken = await auth.verifyIdToken(token);
        return { uid: decodedToken.uid, email: decodedToken.email };
      },
    },
  };
}
