/**
 * Lock file management for single-instance enforcement per role
 */

import { rmSync } from "fs";
import { mkdir, readFile, unlink, writeFile } from "fs/promises";
import { dirname } from "path";
import { createLogger, errorMessage } from "./logger";

const log = createLogger("lock");

export interface LockManager {
  /** Attempt to acquire the lock */
  acquire(): Promise<boolean>;

  /** Release the lock */
  release(): Promise<void>;

  /** Check if lock is held by a live process */
  isLocked(): Promise<boolean>;
}

/**
 * Signal 0 probes for existence without delivering anything
 */
export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function readLockPid(lockFile: string): Promise<number | null> {
  try {
    const content = await readFile(lockFile, "utf-8");
    const pid = Number.parseInt(content, 10);
    return Number.isFinite(pid) ? pid : null;
  } catch {
    return null;
  }
}

/**
 * Create a lock manager for a given lock file path
 */
export function createLockManager(lockFile: string): LockManager {
  return {
    async acquire(): Promise<boolean> {
      try {
        const pid = await readLockPid(lockFile);

        if (pid !== null) {
          if (isProcessRunning(pid)) {
            log.warn({ pid }, "Another instance is running");
            return false;
          }
          log.info({ pid }, "Stale lock found, taking over");
        }

        await mkdir(dirname(lockFile), { recursive: true });
        await writeFile(lockFile, process.pid.toString());
        log.debug({ pid: process.pid, lockFile }, "Lock acquired");
        return true;
      } catch (error) {
        log.error({ error: errorMessage(error) }, "Failed to acquire lock");
        return false;
      }
    },

    async release(): Promise<void> {
      try {
        await unlink(lockFile);
        log.debug({ lockFile }, "Lock released");
      } catch (error) {
        log.debug({ lockFile, error: errorMessage(error) }, "Lock already released");
      }
    },

    async isLocked(): Promise<boolean> {
      const pid = await readLockPid(lockFile);
      return pid !== null && isProcessRunning(pid);
    },
  };
}

/**
 * Release the lock on exit and run a graceful shutdown on SIGINT/SIGTERM
 */
export function setupShutdown(lockFile: string, onShutdown: () => Promise<void>): void {
  let shuttingDown = false;

  process.on("exit", () => {
    rmSync(lockFile, { force: true });
  });

  const handle = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Shutting down");
    try {
      await onShutdown();
    } catch (error) {
      log.error({ error: errorMessage(error) }, "Shutdown failed");
    }
    await createLockManager(lockFile).release();
    process.exit(0);
  };

  process.on("SIGINT", handle);
  process.on("SIGTERM", handle);
}
