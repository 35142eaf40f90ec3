/**
 * Lock manager tests
 */

import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createLockManager, isProcessRunning } from "../../../src/utils/lock";

describe("LockManager", () => {
  let dir: string;
  let lockFile: string;
  let lockManager: ReturnType<typeof createLockManager>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "beacon-lock-"));
    lockFile = join(dir, "state", "source.lock");
    lockManager = createLockManager(lockFile);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("acquires lock and creates its directory", async () => {
    const acquired = await lockManager.acquire();

    expect(acquired).toBe(true);
    expect(await readFile(lockFile, "utf-8")).toBe(process.pid.toString());
  });

  test("fails to acquire lock when a live process holds it", async () => {
    await lockManager.acquire();

    expect(await createLockManager(lockFile).acquire()).toBe(false);
  });

  test("takes over a lock with a stale PID", async () => {
    await lockManager.acquire();
    await writeFile(lockFile, "999999999");

    expect(await lockManager.acquire()).toBe(true);
  });

  test("releases lock", async () => {
    await lockManager.acquire();
    await lockManager.release();

    const content = await readFile(lockFile, "utf-8").catch(() => null);
    expect(content).toBeNull();
  });

  test("isLocked reflects the holder", async () => {
    expect(await lockManager.isLocked()).toBe(false);

    await lockManager.acquire();
    expect(await lockManager.isLocked()).toBe(true);
  });
});

describe("isProcessRunning", () => {
  test("sees the current process", () => {
    expect(isProcessRunning(process.pid)).toBe(true);
  });

  test("rejects a pid that cannot exist", () => {
    expect(isProcessRunning(999999999)).toBe(false);
  });
});
