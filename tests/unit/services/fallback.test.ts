/**
 * FallbackDelivery unit tests
 */

import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Clipboard } from "../../../src/services/clipboard";
import { FallbackDelivery } from "../../../src/services/fallback";
import { CommandError } from "../../../src/utils/command";
import { RecordingNotifier, createFakeRunner, createTestLogger, sid } from "../../setup";

describe("FallbackDelivery", () => {
  let dir: string;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "beacon-fallback-"));
    notifier = new RecordingNotifier();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createDelivery(run = createFakeRunner().run, responseDir = dir) {
    return new FallbackDelivery(
      { responseDir, statusFilePrefix: "beacon-" },
      new Clipboard("darwin", run),
      notifier,
      createTestLogger()
    );
  }

  test("writes the response file, copies it and tells the user", async () => {
    const { run, calls } = createFakeRunner();
    const delivery = createDelivery(run);
    const expectedPath = join(dir, "beacon-response-abc.txt");

    const result = await delivery.deliver(sid("abc"), "api", "yes, go ahead");

    expect(result).toEqual({ filePath: expectedPath, copied: true });
    expect(await readFile(expectedPath, "utf-8")).toBe("yes, go ahead");
    expect(await readdir(dir)).toEqual(["beacon-response-abc.txt"]);
    expect(calls).toEqual([{ command: "pbcopy", args: [], input: "yes, go ahead" }]);
    expect(notifier.notifications).toEqual([
      {
        title: "Response ready for api",
        body: `Your response is in your clipboard and saved to ${expectedPath}. Paste it in the terminal.`,
      },
    ]);
  });

  test("still writes the file when the clipboard fails", async () => {
    const { run } = createFakeRunner(() => {
      throw new CommandError("spawn pbcopy ENOENT", null, "", "ENOENT");
    });
    const delivery = createDelivery(run);
    const expectedPath = delivery.responsePath(sid("abc"));

    const result = await delivery.deliver(sid("abc"), "api", "yes");

    expect(result).toEqual({ filePath: expectedPath, copied: false });
    expect(notifier.notifications[0]?.body).toBe(
      `Your response is saved to ${expectedPath}. Paste it in the terminal.`
    );
  });

  test("creates the response directory when missing", async () => {
    const nested = join(dir, "responses");
    const delivery = createDelivery(createFakeRunner().run, nested);

    const result = await delivery.deliver(sid("abc"), "api", "yes");

    expect(result.filePath).toBe(join(nested, "beacon-response-abc.txt"));
  });
});
