/**
 * CleanupSweep - removes remote sessions that are gone locally
 *
 * Only ids that were actually observed remotely and are absent from the
 * current local set are deleted. A failed or empty fetch deletes nothing.
 */

import type { Logger } from "pino";
import type { RecordStore, SessionId } from "../types";
import { isStoreError } from "../utils/errors";
import { errorMessage } from "../utils/logger";
import type { SessionQueryEngine } from "./query";

export class CleanupSweep {
  private store: RecordStore;
  private queries: SessionQueryEngine;
  private log: Logger;

  constructor(store: RecordStore, queries: SessionQueryEngine, logger: Logger) {
    this.store = store;
    this.queries = queries;
    this.log = logger;
  }

  /**
   * Returns the ids that were deleted
   */
  async sweep(activeIds: ReadonlySet<SessionId>): Promise<string[]> {
    let remoteIds: SessionId[];
    try {
      remoteIds = (await this.queries.fetchActiveStrict()).map((s) => s.id);
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Cleanup skipped, remote fetch failed");
      return [];
    }

    // Empty is indistinguishable from a query that silently returned nothing
    if (remoteIds.length === 0) return [];

    const deleted: string[] = [];
    for (const id of remoteIds) {
      if (activeIds.has(id)) continue;

      try {
        await this.store.delete("Session", id);
        deleted.push(id);
      } catch (error) {
        if (isStoreError(error, "not_found")) continue;
        this.log.warn({ sessionId: id, error: errorMessage(error) }, "Failed to delete stale session");
      }
    }

    if (deleted.length > 0) {
      this.log.info({ deleted }, "Removed stale sessions");
    }
    return deleted;
  }
}
