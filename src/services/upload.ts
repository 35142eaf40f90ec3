/**
 * UploadPipeline - debounced, upserting publisher of local session state
 *
 * Called once per local tick. Status changes are debounced per session so
 * a burst of transitions collapses into one write of the settled status;
 * unchanged sessions are re-saved every tick to keep their timestamp inside
 * the remote query window.
 */

import type { Logger } from "pino";
import { encodeSessionRecord } from "../store/codec";
import type {
  AppConfig,
  LocalSession,
  RecordStore,
  SessionId,
  SessionRecord,
  SessionStatus,
} from "../types";
import { isStoreError } from "../utils/errors";
import { errorMessage } from "../utils/logger";

export type UploadConfig = Pick<AppConfig, "deviceName" | "uploadDebounceMs">;

export type UpsertOutcome = "created" | "updated";

export class UploadPipeline {
  private store: RecordStore;
  private config: UploadConfig;
  private log: Logger;

  private timers = new Map<SessionId, ReturnType<typeof setTimeout>>();
  private lastPublished = new Map<SessionId, SessionStatus>();
  private writing = new Set<SessionId>();
  /** Settled status waiting for the running write of the same id */
  private queued = new Map<SessionId, LocalSession>();
  private inFlight = new Set<Promise<void>>();
  private currentIds = new Set<SessionId>();
  private available = false;

  constructor(store: RecordStore, config: UploadConfig, logger: Logger) {
    this.store = store;
    this.config = config;
    this.log = logger;
  }

  /**
   * Feed one tick of local sessions into the pipeline
   */
  async publish(sessions: LocalSession[]): Promise<void> {
    this.currentIds = new Set(sessions.map((s) => s.id));

    // Timers for sessions that vanished would resurrect them remotely
    for (const [id, timer] of this.timers) {
      if (!this.currentIds.has(id)) {
        clearTimeout(timer);
        this.timers.delete(id);
      }
    }
    for (const id of this.lastPublished.keys()) {
      if (!this.currentIds.has(id)) this.lastPublished.delete(id);
    }
    for (const id of this.queued.keys()) {
      if (!this.currentIds.has(id)) this.queued.delete(id);
    }

    if (sessions.length === 0) return;

    if (!(await this.ensureAvailable())) {
      this.log.debug({ sessions: sessions.length }, "Store unavailable, skipping tick");
      return;
    }

    for (const session of sessions) {
      const changed =
        this.timers.has(session.id) || this.lastPublished.get(session.id) !== session.status;

      if (changed) {
        this.schedule(session);
      } else if (!this.writing.has(session.id)) {
        this.startWrite(session);
      }
    }
  }

  /**
   * Wait for every started write to settle
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  /**
   * Cancel pending debounce timers. Started writes still complete.
   */
  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.queued.clear();
  }

  /**
   * Fetch-then-save by id. Never inserts over an existing record.
   * A pid the session no longer reports is removed from the stored record.
   */
  async upsert(record: SessionRecord): Promise<UpsertOutcome> {
    const fields = encodeSessionRecord(record);
    const removed = record.pid === undefined ? ["pid"] : [];

    try {
      await this.store.fetch("Session", record.id);
      await this.store.update("Session", record.id, fields, removed);
      return "updated";
    } catch (error) {
      if (!isStoreError(error, "not_found")) throw error;
    }

    try {
      await this.store.create({ recordType: "Session", id: record.id, fields });
      return "created";
    } catch (error) {
      if (!isStoreError(error, "conflict")) throw error;
    }

    // Another writer created it between our fetch and create
    await this.store.update("Session", record.id, fields, removed);
    return "updated";
  }

  private schedule(session: LocalSession): void {
    const existing = this.timers.get(session.id);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.timers.delete(session.id);
      if (this.writing.has(session.id)) {
        // One write per id at a time; the settled status goes next
        this.queued.set(session.id, session);
      } else {
        this.startWrite(session);
      }
    }, this.config.uploadDebounceMs);

    this.timers.set(session.id, timer);
    this.log.debug({ sessionId: session.id, status: session.status }, "Write scheduled");
  }

  private startWrite(session: LocalSession): void {
    this.writing.add(session.id);

    const task = this.write(session).finally(() => {
      this.writing.delete(session.id);
      this.inFlight.delete(task);

      const next = this.queued.get(session.id);
      if (next) {
        this.queued.delete(session.id);
        this.startWrite(next);
      }
    });
    this.inFlight.add(task);
  }

  private async write(session: LocalSession): Promise<void> {
    const record: SessionRecord = {
      id: session.id,
      status: session.status,
      project: session.project,
      timestamp: new Date(),
      pid: session.pid,
      sourceDeviceName: this.config.deviceName,
    };

    try {
      const outcome = await this.upsert(record);
      if (this.currentIds.has(session.id)) {
        this.lastPublished.set(session.id, session.status);
      }
      this.log.debug({ sessionId: session.id, status: session.status, outcome }, "Session published");
    } catch (error) {
      if (isStoreError(error, "unavailable")) {
        this.available = false;
      }
      this.log.warn(
        { sessionId: session.id, error: errorMessage(error) },
        "Session publish failed, retrying next tick"
      );
    }
  }

  private async ensureAvailable(): Promise<boolean> {
    if (this.available) return true;

    this.available = (await this.store.checkAvailability()) === "available";
    return this.available;
  }
}
