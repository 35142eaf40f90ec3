/**
 * Store factory and exports
 */

import { getApps, initializeApp } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import type { Logger } from "pino";
import type { AppConfig, PushChannel, RecordStore } from "../types";
import { FirestoreRecordStore } from "./firestore";
import { InMemoryRecordStore } from "./memory";

export { FirestoreRecordStore, toStoreError } from "./firestore";
export { InMemoryRecordStore, type InMemoryStoreOptions } from "./memory";
export * from "./codec";
export { queryAll } from "./paging";

export type SyncStore = RecordStore & PushChannel;

/**
 * Build the configured store backend
 */
export function createRecordStore(config: AppConfig, logger: Logger): SyncStore {
  if (config.storeBackend === "memory") {
    logger.warn("Using the in-process store; nothing is shared with other devices");
    return new InMemoryRecordStore();
  }

  // Credentials come from GOOGLE_APPLICATION_CREDENTIALS or the emulator host
  const app = getApps()[0] ?? initializeApp({ projectId: config.firebaseProjectId });
  logger.info(
    { projectId: config.firebaseProjectId, prefix: config.collectionPrefix || undefined },
    "Using Firestore"
  );
  return new FirestoreRecordStore(getFirestore(app), config.collectionPrefix, logger);
}
