/**
 * FallbackDelivery - hands a response to the user when it cannot be typed
 *
 * The text lands in a per-session response file and on the clipboard, and
 * the user is told to paste it.
 */

import { mkdir, rename, writeFile } from "fs/promises";
import { join } from "path";
import type { Logger } from "pino";
import type { AppConfig, SessionId } from "../types";
import { errorMessage } from "../utils/logger";
import { responseFileName } from "../utils/session-id";
import type { Clipboard } from "./clipboard";
import type { Notifier } from "./notifier";

export type FallbackConfig = Pick<AppConfig, "responseDir" | "statusFilePrefix">;

export interface FallbackResult {
  /** Response file path, null if it could not be written */
  filePath: string | null;
  copied: boolean;
}

export class FallbackDelivery {
  private config: FallbackConfig;
  private clipboard: Clipboard;
  private notifier: Notifier;
  private log: Logger;

  constructor(config: FallbackConfig, clipboard: Clipboard, notifier: Notifier, logger: Logger) {
    this.config = config;
    this.clipboard = clipboard;
    this.notifier = notifier;
    this.log = logger;
  }

  responsePath(sessionId: SessionId): string {
    return join(this.config.responseDir, responseFileName(sessionId, this.config.statusFilePrefix));
  }

  async deliver(sessionId: SessionId, project: string, text: string): Promise<FallbackResult> {
    const filePath = await this.writeResponseFile(sessionId, text);

    let copied = false;
    try {
      await this.clipboard.copy(text);
      copied = true;
    } catch (error) {
      this.log.warn({ sessionId, error: errorMessage(error) }, "Clipboard copy failed");
    }

    const where = [copied ? "in your clipboard" : null, filePath ? `saved to ${filePath}` : null]
      .filter((part): part is string => part !== null)
      .join(" and ");

    await this.notifier.notify({
      title: `Response ready for ${project}`,
      body: where
        ? `Your response is ${where}. Paste it in the terminal.`
        : `Your response could not be delivered: ${text}`,
    });

    return { filePath, copied };
  }

  private async writeResponseFile(sessionId: SessionId, text: string): Promise<string | null> {
    const path = this.responsePath(sessionId);
    const tmp = `${path}.${process.pid}.tmp`;

    try {
      await mkdir(this.config.responseDir, { recursive: true });
      await writeFile(tmp, text, "utf-8");
      await rename(tmp, path);
      this.log.info({ sessionId, path }, "Response written to file");
      return path;
    } catch (error) {
      this.log.error({ sessionId, path, error: errorMessage(error) }, "Failed to write response file");
      return null;
    }
  }
}
