/**
 * Session types shared by the detector, the upload pipeline and the query engine
 */

import type { SessionStatus } from "./status";

declare const sessionIdBrand: unique symbol;

/**
 * Canonical session identifier. Only produced by the helpers in
 * utils/session-id so the publish and response paths always agree.
 */
export type SessionId = string & { readonly [sessionIdBrand]: true };

/** One session as observed on the source machine during a tick */
export interface LocalSession {
  id: SessionId;
  status: SessionStatus;
  project: string;
  pid?: number;

  /** When the hook last wrote the status file */
  timestamp: Date;
}

/** Remote-visible state of one local session */
export interface SessionRecord {
  id: SessionId;
  status: SessionStatus;
  project: string;

  /** Write time of the record, never a propagated local time */
  timestamp: Date;

  pid?: number;
  sourceDeviceName: string;
}

/** Raw status file contents as written by the CLI hook */
export interface StatusFileData {
  state: SessionStatus;
  message?: string;
  timestamp?: string;
  project?: string;
  pid?: number;
}

export interface ScanResult {
  sessions: LocalSession[];

  /** Files that could not be read or decoded this tick */
  errorCount: number;
}
