import admin from "firebase-admin";
import fs from "node:fs";
import type { AppConfig } from "./config.js";
import { ConfigError } from "./errors.js";

/**
 * Returns a Firestore handle when Firebase credentials are configured, or
 * null to fall back to the JSON file store.
 */
export function initializeFirestore(config: AppConfig["firestore"]): admin.firestore.Firestore | null {
  let credential: admin.credential.Credential;

  if (config.serviceAccountJson) {
    let json: unknown;
    try {
      json = JSON.parse(config.serviceAccountJson);
    } catch {
      throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON is not valid JSON");
    }
    if (typeof json !== "object" || json === null) {
      throw new ConfigError("FIREBASE_SERVICE_ACCOUNT_JSON must be a JSON object");
    }
    credential = admin.credential.cert(json);
  } else if (config.credentialsPath) {
    const p = config.credentialsPath;
    if (!fs.existsSync(p)) {
      throw new ConfigError(`GOOGLE_APPLICATION_CREDENTIALS not found at: ${p}`);
    }
    credential = admin.credential.cert(p);
  } else {
    return null;
  }

  const app = admin.apps.length ? admin.app() : admin.initializeApp({ credential });
  return admin.firestore(app);
}
