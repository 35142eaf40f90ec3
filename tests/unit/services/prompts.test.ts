/**
 * PromptChannel unit tests
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { PromptChannel } from "../../../src/services/prompts";
import { encodePromptRecord } from "../../../src/store/codec";
import { InMemoryRecordStore } from "../../../src/store/memory";
import { createTestLogger, promptRecord, sid } from "../../setup";

describe("PromptChannel", () => {
  let store: InMemoryRecordStore;
  let channel: PromptChannel;

  beforeEach(() => {
    store = new InMemoryRecordStore();
    channel = new PromptChannel(store, createTestLogger());
  });

  describe("publishPrompt", () => {
    test("creates the record once", async () => {
      const prompt = promptRecord("abc");

      expect(await channel.publishPrompt(prompt)).toBe("created");
      expect(await channel.publishPrompt(prompt)).toBe("exists");
      expect(store.records("Prompt")).toHaveLength(1);
    });

    test("reports skipped when the store is unavailable", async () => {
      store.setAvailable(false);

      expect(await channel.publishPrompt(promptRecord("abc"))).toBe("skipped");
    });
  });

  describe("submitResponse", () => {
    beforeEach(async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T10:05:00Z"));
      await channel.publishPrompt(promptRecord("abc"));
      vi.useRealTimers();
    });

    test("writes only the response fields", async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-01-01T10:05:00Z"));
      const ok = await channel.submitResponse("abc-1767261600000", "  yes  ", "phone");
      vi.useRealTimers();

      expect(ok).toBe(true);
      const [record] = store.records("Prompt");
      expect(record?.fields).toEqual({
        ...encodePromptRecord(promptRecord("abc")),
        responded: true,
        responseText: "yes",
        respondedAt: new Date("2026-01-01T10:05:00Z"),
        respondedFromDevice: "phone",
      });
    });

    test("refuses an empty response", async () => {
      expect(await channel.submitResponse("abc-1767261600000", "   ", "phone")).toBe(false);
      expect(store.records("Prompt")[0]?.fields["responded"]).toBe(false);
    });

    test("returns false for an unknown prompt", async () => {
      expect(await channel.submitResponse("missing", "yes", "phone")).toBe(false);
    });

    test("only the first of two concurrent answers is kept", async () => {
      expect(await channel.submitResponse("abc-1767261600000", "first", "phone")).toBe(true);
      expect(await channel.submitResponse("abc-1767261600000", "second", "tablet")).toBe(false);

      const prompt = await channel.fetchPrompt("abc-1767261600000");
      expect(prompt?.responseText).toBe("first");
      expect(prompt?.respondedFromDevice).toBe("phone");
    });

    test("returns false for a malformed record", async () => {
      await store.create({ recordType: "Prompt", id: "broken", fields: { promptId: "broken" } });

      expect(await channel.submitResponse("broken", "yes", "phone")).toBe(false);
    });
  });

  describe("queries", () => {
    test("fetchPendingPrompts returns unanswered prompts, newest first", async () => {
      await channel.publishPrompt(promptRecord("old", { timestamp: new Date("2026-01-01T09:00:00Z") }));
      await channel.publishPrompt(promptRecord("new", { timestamp: new Date("2026-01-01T11:00:00Z") }));
      await channel.publishPrompt(
        promptRecord("done", { timestamp: new Date("2026-01-01T10:00:00Z") })
      );
      await channel.submitResponse("done-1767261600000", "ok", "phone");

      const pending = await channel.fetchPendingPrompts();

      expect(pending.map((p) => p.sessionId)).toEqual(["new", "old"]);
    });

    test("fetchResponses returns answered prompts of one session", async () => {
      const first = promptRecord("abc", { timestamp: new Date("2026-01-01T09:00:00Z") });
      const second = promptRecord("abc", { timestamp: new Date("2026-01-01T09:30:00Z") });
      const other = promptRecord("xyz");
      for (const prompt of [first, second, other]) {
        await channel.publishPrompt(prompt);
      }
      await channel.submitResponse(second.id, "later", "phone");
      await channel.submitResponse(other.id, "elsewhere", "phone");

      const responses = await channel.fetchResponses(sid("abc"));

      expect(responses.map((p) => p.responseText)).toEqual(["later"]);
    });

    test("return [] before any prompt was published", async () => {
      expect(await channel.fetchPendingPrompts()).toEqual([]);
      expect(await channel.fetchResponses(sid("abc"))).toEqual([]);
    });

    test("fetchPendingPrompts rejects when the store is unavailable", async () => {
      await channel.publishPrompt(promptRecord("abc"));
      store.setAvailable(false);

      await expect(channel.fetchPendingPrompts()).rejects.toMatchObject({ code: "unavailable" });
    });
  });

  describe("deletePrompt", () => {
    test("removes the record", async () => {
      const prompt = promptRecord("abc");
      await channel.publishPrompt(prompt);

      expect(await channel.deletePrompt(prompt.id)).toBe(true);
      expect(await channel.fetchPrompt(prompt.id)).toBeNull();
    });

    test("treats an already deleted record as deleted", async () => {
      await channel.publishPrompt(promptRecord("abc"));

      expect(await channel.deletePrompt("missing")).toBe(true);
    });

    test("returns false when the store is unavailable", async () => {
      const prompt = promptRecord("abc");
      await channel.publishPrompt(prompt);
      store.setAvailable(false);

      expect(await channel.deletePrompt(prompt.id)).toBe(false);
    });
  });
});
