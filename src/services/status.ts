/**
 * StatusScanner - local session detector
 *
 * The CLI hook writes one status file per session into the status
 * directory, plus a prompt file while a session waits for input. Each scan
 * reads them all, drops sessions past the local timeout or whose process is
 * gone, and returns what is left as this tick's active sessions.
 */

import { readdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { join } from "path";
import type { Logger } from "pino";
import { z } from "zod";
import type {
  AppConfig,
  LocalSession,
  PromptFileData,
  ScanResult,
  SessionId,
  SessionStatus,
  StatusFileData,
} from "../types";
import { SESSION_STATUSES } from "../types";
import { isProcessRunning } from "../utils/lock";
import { errorMessage } from "../utils/logger";
import { promptFileName, sessionIdFromStatusFile, statusFileName } from "../utils/session-id";

export type ScannerConfig = Pick<
  AppConfig,
  "statusDir" | "statusFilePrefix" | "localSessionTimeoutMs" | "pidCheckAfterMs"
>;

const UNKNOWN_PROJECT = "Unknown";

const statusFileSchema = z.object({
  state: z.enum(SESSION_STATUSES),
  message: z.string().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  project: z.string().optional(),
  pid: z.number().int().positive().optional(),
});

const promptFileSchema = z.object({
  session_id: z.string(),
  project: z.string(),
  prompt_message: z.string(),
  notification_type: z.string(),
  transcript_path: z.string().optional(),
  transcript_excerpt: z.string().optional(),
  timestamp: z.string(),
  pid: z.number().int().positive().optional(),
});

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Combined status across sessions: NeedsInput > Working > Idle > NotRunning
 */
export function aggregateStatus(sessions: Pick<LocalSession, "status">[]): SessionStatus {
  const statuses = new Set(sessions.map((s) => s.status));
  if (statuses.has("needs_input")) return "needs_input";
  if (statuses.has("working")) return "working";
  if (statuses.has("idle")) return "idle";
  return "not_running";
}

export class StatusScanner {
  private config: ScannerConfig;
  private log: Logger;
  private isAlive: (pid: number) => boolean;

  constructor(
    config: ScannerConfig,
    logger: Logger,
    isAlive: (pid: number) => boolean = isProcessRunning
  ) {
    this.config = config;
    this.log = logger;
    this.isAlive = isAlive;
  }

  /**
   * Read every status file and return the sessions that are still live
   */
  async scan(now: Date = new Date()): Promise<ScanResult> {
    let files: string[];
    try {
      files = await readdir(this.config.statusDir);
    } catch (error) {
      if (isMissing(error)) return { sessions: [], errorCount: 0 };
      this.log.warn({ statusDir: this.config.statusDir, error: errorMessage(error) }, "Scan failed");
      return { sessions: [], errorCount: 1 };
    }

    const sessions: LocalSession[] = [];
    let errorCount = 0;

    for (const file of files) {
      const id = sessionIdFromStatusFile(file, this.config.statusFilePrefix);
      if (!id) continue;

      let data: StatusFileData | null;
      try {
        data = await this.readStatusFile(file);
      } catch (error) {
        errorCount++;
        this.log.debug({ file, error: errorMessage(error) }, "Unreadable status file");
        continue;
      }
      if (!data) continue;

      const timestamp = data.timestamp ? new Date(data.timestamp) : now;
      const age = now.getTime() - timestamp.getTime();

      if (age >= this.config.localSessionTimeoutMs) {
        this.log.info({ sessionId: id, age }, "Removing expired session");
        await this.removeSessionFiles(id);
        continue;
      }

      // Young sessions may still report the short-lived shell that ran the hook
      if (age > this.config.pidCheckAfterMs && data.pid !== undefined && !this.isAlive(data.pid)) {
        this.log.info({ sessionId: id, pid: data.pid }, "Removing session of exited process");
        await this.removeSessionFiles(id);
        continue;
      }

      sessions.push({
        id,
        status: data.state,
        project: data.project || UNKNOWN_PROJECT,
        pid: data.pid,
        timestamp,
      });
    }

    sessions.sort((a, b) => a.project.localeCompare(b.project) || a.id.localeCompare(b.id));
    return { sessions, errorCount };
  }

  /**
   * Prompt context the hook left for a session waiting on input
   */
  async readPrompt(id: SessionId): Promise<PromptFileData | null> {
    const path = join(this.config.statusDir, promptFileName(id, this.config.statusFilePrefix));

    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      if (!isMissing(error)) {
        this.log.warn({ sessionId: id, error: errorMessage(error) }, "Failed to read prompt file");
      }
      return null;
    }

    try {
      const parsed = promptFileSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
      this.log.warn({ sessionId: id }, "Prompt file has unexpected shape");
    } catch (error) {
      this.log.warn({ sessionId: id, error: errorMessage(error) }, "Prompt file is not JSON");
    }
    return null;
  }

  /**
   * Rewrite a session's status file to working after its input was delivered
   */
  async markWorking(session: Pick<LocalSession, "id" | "project" | "pid">): Promise<void> {
    const data: StatusFileData = {
      state: "working",
      project: session.project,
      timestamp: new Date().toISOString(),
      pid: session.pid,
    };
    const path = join(this.config.statusDir, statusFileName(session.id, this.config.statusFilePrefix));
    const tmp = `${path}.${process.pid}.tmp`;

    await writeFile(tmp, JSON.stringify(data));
    await rename(tmp, path);
    this.log.debug({ sessionId: session.id }, "Status set to working");
  }

  async removePrompt(id: SessionId): Promise<void> {
    await this.removeFile(promptFileName(id, this.config.statusFilePrefix));
  }

  /**
   * Returns null for an empty file, which the hook leaves mid-write
   */
  private async readStatusFile(file: string): Promise<StatusFileData | null> {
    const content = await readFile(join(this.config.statusDir, file), "utf-8");
    if (!content.trim()) return null;
    return statusFileSchema.parse(JSON.parse(content));
  }

  private async removeSessionFiles(id: SessionId): Promise<void> {
    await this.removeFile(statusFileName(id, this.config.statusFilePrefix));
    await this.removeFile(promptFileName(id, this.config.statusFilePrefix));
  }

  private async removeFile(file: string): Promise<void> {
    try {
      await unlink(join(this.config.statusDir, file));
    } catch (error) {
      if (!isMissing(error)) {
        this.log.warn({ file, error: errorMessage(error) }, "Failed to remove file");
      }
    }
  }
}
