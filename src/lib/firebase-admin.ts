import { type App, cert, getApps, initializeApp } from "firebase-admin/app";
import { type Firestore, getFirestore } from "firebase-admin/firestore";

import type { FirebaseSettings } from "@/lib/config";
import { ConfigurationError } from "@/lib/errors";
import { errorMessage } from "@/lib/result";

let cachedApp: App | undefined;

function hasAnySetting(settings: FirebaseSettings): boolean {
  return Boolean(settings.serviceAccountKey || settings.projectId || settings.privateKey || settings.clientEmail);
}

function initializeFromServiceAccount(settings: FirebaseSettings, serviceAccountKey: string): App | undefined {
  try {
    const parsed = JSON.parse(serviceAccountKey) as {
      project_id?: string;
      client_email?: string;
      private_key?: string;
    };
    if (!parsed.client_email || !parsed.private_key) {
      throw new Error("FIREBASE_SERVICE_ACCOUNT_KEY is missing required fields");
    }
    return initializeApp({
      credential: cert({
        projectId: parsed.project_id ?? settings.projectId,
        clientEmail: parsed.client_email,
        privateKey: parsed.private_key.replace(/\\n/g, "\n"),
      }),
    });
  } catch (error) {
    if (settings.production) {
      throw new ConfigurationError(`Invalid FIREBASE_SERVICE_ACCOUNT_KEY configuration: ${errorMessage(error)}`);
    }

    console.warn("[firebase-admin] FIREBASE_SERVICE_ACCOUNT_KEY is invalid, falling back", {
      message: errorMessage(error),
    });
    return undefined;
  }
}

/**
 * Returns the Admin app, or `null` when no Firebase setting is present at all.
 * In that case conversation memory runs stateless.
 */
export function getAdminApp(settings: FirebaseSettings): App | null {
  if (cachedApp) {
    return cachedApp;
  }

  const existing = getApps();
  if (existing.length) {
    cachedApp = existing[0];
    return cachedApp;
  }

  if (!hasAnySetting(settings)) {
    return null;
  }

  if (settings.serviceAccountKey) {
    cachedApp = initializeFromServiceAccount(settings, settings.serviceAccountKey);
    if (cachedApp) {
      return cachedApp;
    }
  }

  const { privateKey, clientEmail, projectId } = settings;

  if (privateKey && clientEmail && projectId) {
    cachedApp = initializeApp({
      credential: cert({
        projectId,
        clientEmail,
        privateKey: privateKey.replace(/\\n/g, "\n"),
      }),
    });
    return cachedApp;
  }

  if (privateKey || clientEmail) {
    const message =
      "Incomplete Firebase Admin credential env vars: FIREBASE_PRIVATE_KEY, FIREBASE_CLIENT_EMAIL, and FIREBASE_PROJECT_ID are all required";
    if (settings.production) {
      throw new ConfigurationError(message);
    }
    console.warn(`[firebase-admin] ${message}`);
  }

  if (!projectId) {
    return null;
  }

  // Application Default Credentials (GCP / GOOGLE_APPLICATION_CREDENTIALS)
  cachedApp = initializeApp({ projectId });
  return cachedApp;
}

export function getAdminFirestore(settings: FirebaseSettings): Firestore | null {
  const app = getAdminApp(settings);
  return app ? getFirestore(app) : null;
}
