/**
 * PromptPublisher - raises a prompt record when a session starts waiting
 */

import type { Logger } from "pino";
import type { LocalSession, PromptFileData, PromptRecord, SessionId } from "../types";
import type { PromptChannel } from "./prompts";
import type { StatusScanner } from "./status";

/**
 * One occurrence of a prompt maps to one id: the session plus the time the
 * hook raised it
 */
export function buildPromptRecord(session: LocalSession, file: PromptFileData): PromptRecord {
  const raisedAt = Date.parse(file.timestamp);
  const timestamp = Number.isNaN(raisedAt) ? session.timestamp : new Date(raisedAt);

  return {
    id: `${session.id}-${timestamp.getTime()}`,
    sessionId: session.id,
    project: file.project || session.project,
    promptMessage: file.prompt_message,
    notificationType: file.notification_type,
    transcriptPath: file.transcript_path,
    transcriptExcerpt: file.transcript_excerpt,
    timestamp,
    pid: file.pid ?? session.pid,
    responded: false,
  };
}

export class PromptPublisher {
  private scanner: Pick<StatusScanner, "readPrompt">;
  private channel: PromptChannel;
  private log: Logger;

  /** Last prompt id published per waiting session */
  private published = new Map<SessionId, string>();

  constructor(scanner: Pick<StatusScanner, "readPrompt">, channel: PromptChannel, logger: Logger) {
    this.scanner = scanner;
    this.channel = channel;
    this.log = logger;
  }

  /**
   * Publish prompts for sessions in needs_input that have not been published yet
   */
  async process(sessions: LocalSession[]): Promise<PromptRecord[]> {
    const waiting = new Set<SessionId>();
    const raised: PromptRecord[] = [];

    for (const session of sessions) {
      if (session.status !== "needs_input") continue;
      waiting.add(session.id);

      const file = await this.scanner.readPrompt(session.id);
      if (!file) {
        // The hook writes the prompt file right after the status file
        this.log.debug({ sessionId: session.id }, "No prompt file yet");
        continue;
      }

      const prompt = buildPromptRecord(session, file);
      if (this.published.get(session.id) === prompt.id) continue;

      const outcome = await this.channel.publishPrompt(prompt);
      if (outcome === "skipped") continue;

      this.published.set(session.id, prompt.id);
      if (outcome === "created") raised.push(prompt);
    }

    for (const id of this.published.keys()) {
      if (!waiting.has(id)) this.published.delete(id);
    }

    return raised;
  }
}
