/**
 * SessionQueryEngine unit tests
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SessionQueryEngine } from "../../../src/services/query";
import { encodeSessionRecord } from "../../../src/store/codec";
import { InMemoryRecordStore } from "../../../src/store/memory";
import type { SessionStatus } from "../../../src/types";
import { RecordingNotifier, createTestLogger, sid } from "../../setup";

const NOW = new Date("2026-01-01T12:00:00Z");
const WINDOW_MS = 30 * 60 * 1000;

function minutesAgo(minutes: number, extraMs = 0): Date {
  return new Date(NOW.getTime() - minutes * 60 * 1000 - extraMs);
}

async function seed(
  store: InMemoryRecordStore,
  id: string,
  timestamp: Date,
  status: SessionStatus = "working"
) {
  await store.create({
    recordType: "Session",
    id,
    fields: encodeSessionRecord({
      id: sid(id),
      status,
      project: "demo",
      timestamp,
      sourceDeviceName: "laptop",
    }),
  });
}

describe("SessionQueryEngine", () => {
  let store: InMemoryRecordStore;
  let notifier: RecordingNotifier;
  let engine: SessionQueryEngine;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    store = new InMemoryRecordStore();
    notifier = new RecordingNotifier();
    engine = new SessionQueryEngine(
      store,
      { sessionExpirationMs: WINDOW_MS, queryPageSize: 100 },
      createTestLogger(),
      notifier
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("fetchActive", () => {
    test("returns sessions inside the window, newest first", async () => {
      await seed(store, "boundary", minutesAgo(30));
      await seed(store, "recent", minutesAgo(1));
      await seed(store, "expired", minutesAgo(30, 1));

      const sessions = await engine.fetchActive();

      expect(sessions.map((s) => s.id)).toEqual(["recent", "boundary"]);
    });

    test("works without unrestricted queries when timestamp is indexed", async () => {
      store = new InMemoryRecordStore({
        allowUnrestrictedQueries: false,
        indexes: { Session: ["timestamp"] },
      });
      engine = new SessionQueryEngine(
        store,
        { sessionExpirationMs: WINDOW_MS, queryPageSize: 100 },
        createTestLogger()
      );
      await seed(store, "a", minutesAgo(2));
      await seed(store, "b", minutesAgo(5));

      expect((await engine.fetchActive()).map((s) => s.id)).toEqual(["a", "b"]);
    });

    test("follows continuation cursors across pages", async () => {
      engine = new SessionQueryEngine(
        store,
        { sessionExpirationMs: WINDOW_MS, queryPageSize: 2 },
        createTestLogger()
      );
      for (let i = 1; i <= 5; i++) {
        await seed(store, `s${i}`, minutesAgo(i));
      }
      const query = vi.spyOn(store, "query");

      const sessions = await engine.fetchActive();

      expect(sessions.map((s) => s.id)).toEqual(["s1", "s2", "s3", "s4", "s5"]);
      expect(query).toHaveBeenCalledTimes(3);
    });

    test("skips malformed records and keeps the rest", async () => {
      await seed(store, "good", minutesAgo(1));
      await store.create({
        recordType: "Session",
        id: "bad",
        fields: { sessionId: "bad", status: "sleeping", timestamp: minutesAgo(2) },
      });

      expect((await engine.fetchActive()).map((s) => s.id)).toEqual(["good"]);
    });

    test("returns [] before any session was ever published", async () => {
      expect(await engine.fetchActive()).toEqual([]);
    });

    test("returns [] when the store is unavailable", async () => {
      await seed(store, "a", minutesAgo(1));
      store.setAvailable(false);

      expect(await engine.fetchActive()).toEqual([]);
    });

    test("returns [] when timestamp is not queryable", async () => {
      store = new InMemoryRecordStore({ indexes: { Session: ["sessionId"] } });
      engine = new SessionQueryEngine(
        store,
        { sessionExpirationMs: WINDOW_MS, queryPageSize: 100 },
        createTestLogger()
      );
      await seed(store, "a", minutesAgo(1));

      expect(await engine.fetchActive()).toEqual([]);
    });
  });

  describe("fetchActiveStrict", () => {
    test("rejects when the store is unavailable", async () => {
      await seed(store, "a", minutesAgo(1));
      store.setAvailable(false);

      await expect(engine.fetchActiveStrict()).rejects.toMatchObject({ code: "unavailable" });
    });
  });

  describe("decode failure notice", () => {
    test("notifies once after three consecutive fetches with bad records", async () => {
      await store.create({
        recordType: "Session",
        id: "bad",
        fields: { sessionId: "bad", timestamp: minutesAgo(1) },
      });

      await engine.fetchActive();
      await engine.fetchActive();
      expect(notifier.notifications).toHaveLength(0);

      await engine.fetchActive();
      await engine.fetchActive();
      expect(notifier.notifications).toHaveLength(1);
      expect(notifier.notifications[0]?.title).toBe("Session sync problem");
    });

    test("a clean fetch resets the streak", async () => {
      await store.create({
        recordType: "Session",
        id: "bad",
        fields: { sessionId: "bad", timestamp: minutesAgo(1) },
      });

      await engine.fetchActive();
      await engine.fetchActive();
      await store.delete("Session", "bad");
      await engine.fetchActive();
      await store.create({
        recordType: "Session",
        id: "bad",
        fields: { sessionId: "bad", timestamp: minutesAgo(1) },
      });
      await engine.fetchActive();

      expect(notifier.notifications).toHaveLength(0);
    });
  });

  describe("fetchSession", () => {
    test("returns the decoded record", async () => {
      await seed(store, "abc", minutesAgo(1), "needs_input");

      const session = await engine.fetchSession("abc");

      expect(session?.status).toBe("needs_input");
      expect(session?.timestamp).toEqual(minutesAgo(1));
    });

    test("returns null for a missing record", async () => {
      await seed(store, "abc", minutesAgo(1));

      expect(await engine.fetchSession("gone")).toBeNull();
    });
  });
});
