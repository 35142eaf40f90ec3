/**
 * CleanupSweep unit tests
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { CleanupSweep } from "../../../src/services/cleanup";
import { SessionQueryEngine } from "../../../src/services/query";
import { encodeSessionRecord } from "../../../src/store/codec";
import { InMemoryRecordStore } from "../../../src/store/memory";
import type { SessionId } from "../../../src/types";
import { StoreError } from "../../../src/utils/errors";
import { createTestLogger, sid } from "../../setup";

describe("CleanupSweep", () => {
  let store: InMemoryRecordStore;
  let queries: SessionQueryEngine;
  let sweep: CleanupSweep;

  async function seed(id: string) {
    await store.create({
      recordType: "Session",
      id,
      fields: encodeSessionRecord({
        id: sid(id),
        status: "idle",
        project: "demo",
        timestamp: new Date(),
        sourceDeviceName: "laptop",
      }),
    });
  }

  function active(...ids: string[]): ReadonlySet<SessionId> {
    return new Set(ids.map(sid));
  }

  beforeEach(() => {
    const logger = createTestLogger();
    store = new InMemoryRecordStore();
    queries = new SessionQueryEngine(
      store,
      { sessionExpirationMs: 30 * 60 * 1000, queryPageSize: 100 },
      logger
    );
    sweep = new CleanupSweep(store, queries, logger);
  });

  test("deletes remote sessions that are gone locally", async () => {
    await seed("a");
    await seed("b");
    await seed("c");

    const deleted = await sweep.sweep(active("a", "b"));

    expect(deleted).toEqual(["c"]);
    expect(store.records("Session").map((r) => r.id).sort()).toEqual(["a", "b"]);
  });

  test("never deletes a locally active session", async () => {
    await seed("a");

    expect(await sweep.sweep(active("a"))).toEqual([]);
    expect(store.records("Session")).toHaveLength(1);
  });

  test("does nothing when the remote list is empty", async () => {
    const remove = vi.spyOn(store, "delete");

    expect(await sweep.sweep(active())).toEqual([]);
    expect(remove).not.toHaveBeenCalled();
  });

  test("does nothing when the fetch fails", async () => {
    await seed("a");
    store.setAvailable(false);
    const remove = vi.spyOn(store, "delete");

    expect(await sweep.sweep(active())).toEqual([]);
    expect(remove).not.toHaveBeenCalled();
  });

  test("a record deleted by someone else is not an error", async () => {
    await seed("a");
    await seed("b");
    vi.spyOn(store, "delete").mockRejectedValueOnce(new StoreError("not_found", "gone"));

    const deleted = await sweep.sweep(active());

    expect(deleted).toHaveLength(1);
  });
});
