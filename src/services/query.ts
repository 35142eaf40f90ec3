/**
 * SessionQueryEngine - active session list as seen from a remote device
 */

import type { Logger } from "pino";
import { decodeSessionRecord } from "../store/codec";
import { queryAll } from "../store/paging";
import type { AppConfig, RecordStore, SessionRecord, StoredRecord } from "../types";
import { isStoreError } from "../utils/errors";
import { errorMessage } from "../utils/logger";
import type { Notifier } from "./notifier";

export type QueryConfig = Pick<AppConfig, "sessionExpirationMs" | "queryPageSize">;

/** Consecutive fetches with undecodable records before the user hears about it */
const DEFAULT_MAX_DECODE_FAILURES = 3;

export class SessionQueryEngine {
  private store: RecordStore;
  private config: QueryConfig;
  private log: Logger;
  private notifier: Notifier | null;
  private maxDecodeFailures: number;

  private failedFetches = 0;
  private decodeNoticeSent = false;

  constructor(
    store: RecordStore,
    config: QueryConfig,
    logger: Logger,
    notifier: Notifier | null = null,
    maxDecodeFailures = DEFAULT_MAX_DECODE_FAILURES
  ) {
    this.store = store;
    this.config = config;
    this.log = logger;
    this.notifier = notifier;
    this.maxDecodeFailures = maxDecodeFailures;
  }

  /**
   * Sessions written within the expiration window, newest first.
   * Transport failures yield an empty list.
   */
  async fetchActive(): Promise<SessionRecord[]> {
    try {
      return await this.fetchActiveStrict();
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Active session fetch failed");
      return [];
    }
  }

  /**
   * Same as fetchActive but rejects on transport failure, so "nothing
   * active" can be told apart from "could not ask"
   */
  async fetchActiveStrict(): Promise<SessionRecord[]> {
    const boundary = new Date(Date.now() - this.config.sessionExpirationMs);

    let stored: StoredRecord[];
    try {
      // Range predicate on the indexed timestamp field; never an unrestricted scan
      stored = await queryAll(this.store, {
        recordType: "Session",
        where: [{ field: "timestamp", op: ">=", value: boundary }],
        sort: { field: "timestamp", direction: "desc" },
        limit: this.config.queryPageSize,
      });
    } catch (error) {
      // Nothing has ever been published
      if (isStoreError(error, "not_found")) return [];
      throw error;
    }

    const sessions: SessionRecord[] = [];
    let failures = 0;
    for (const record of stored) {
      const session = decodeSessionRecord(record);
      if (!session) {
        failures++;
        this.log.warn({ recordId: record.id }, "Skipping malformed session record");
        continue;
      }
      if (session.timestamp.getTime() >= boundary.getTime()) {
        sessions.push(session);
      }
    }

    await this.trackDecodeFailures(failures);
    return sessions;
  }

  /**
   * Targeted fetch of one session. Null when absent or malformed.
   */
  async fetchSession(id: string): Promise<SessionRecord | null> {
    try {
      const record = await this.store.fetch("Session", id);
      const session = decodeSessionRecord(record);
      if (!session) {
        this.log.warn({ recordId: id }, "Skipping malformed session record");
      }
      return session;
    } catch (error) {
      if (isStoreError(error, "not_found")) {
        this.log.debug({ sessionId: id }, "Session not found");
      } else {
        this.log.warn({ sessionId: id, error: errorMessage(error) }, "Session fetch failed");
      }
      return null;
    }
  }

  private async trackDecodeFailures(failures: number): Promise<void> {
    if (failures === 0) {
      this.failedFetches = 0;
      this.decodeNoticeSent = false;
      return;
    }

    this.failedFetches++;
    if (this.failedFetches < this.maxDecodeFailures || this.decodeNoticeSent) return;

    this.decodeNoticeSent = true;
    this.log.error({ fetches: this.failedFetches }, "Remote session records keep failing to decode");
    await this.notifier?.notify({
      title: "Session sync problem",
      body: `Some session records could not be read for ${this.failedFetches} refreshes in a row. A device may be running an incompatible version.`,
    });
  }
}
