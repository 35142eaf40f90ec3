/**
 * ResponsePoller - delivers remote answers to the sessions waiting on them
 *
 * Polls the prompt channel for answered prompts of every locally active
 * session. Each prompt id is delivered at most once per process: it is
 * marked processed before anything is typed, so a record that lingers in
 * the store after delivery is only ever deleted again.
 */

import type { Logger } from "pino";
import type { AppConfig, LocalSession, PromptRecord } from "../types";
import { errorMessage } from "../utils/logger";
import type { FallbackDelivery } from "./fallback";
import type { TerminalInjector } from "./injector";
import type { Notifier } from "./notifier";
import type { PromptChannel } from "./prompts";
import type { StatusScanner } from "./status";

export type ResponderConfig = Pick<AppConfig, "responsePollIntervalMs">;

export type DeliveryPath = "injected" | "fallback";

const DEFAULT_PROCESSED_LIMIT = 500;

const DENIAL_REMEDIATION =
  "Automatic replies need permission to control Terminal. Open System Settings > " +
  "Privacy & Security, allow this process under Automation and Accessibility, then " +
  "reply again. Until then responses are copied to your clipboard.";

export class ResponsePoller {
  private channel: PromptChannel;
  private scanner: Pick<StatusScanner, "markWorking" | "removePrompt">;
  private injector: TerminalInjector;
  private fallback: FallbackDelivery;
  private notifier: Notifier;
  private config: ResponderConfig;
  private log: Logger;
  private processedLimit: number;

  private sessions: LocalSession[] = [];
  private processed = new Set<string>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private denialReported = false;

  constructor(
    channel: PromptChannel,
    scanner: Pick<StatusScanner, "markWorking" | "removePrompt">,
    injector: TerminalInjector,
    fallback: FallbackDelivery,
    notifier: Notifier,
    config: ResponderConfig,
    logger: Logger,
    processedLimit = DEFAULT_PROCESSED_LIMIT
  ) {
    this.channel = channel;
    this.scanner = scanner;
    this.injector = injector;
    this.fallback = fallback;
    this.notifier = notifier;
    this.config = config;
    this.log = logger;
    this.processedLimit = processedLimit;
  }

  /**
   * Sessions to poll for, refreshed by every local tick
   */
  setSessions(sessions: LocalSession[]): void {
    this.sessions = sessions;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(async () => {
      await this.poll();
    }, this.config.responsePollIntervalMs);
    this.log.info({ intervalMs: this.config.responsePollIntervalMs }, "Response poller started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  hasProcessed(promptId: string): boolean {
    return this.processed.has(promptId);
  }

  /**
   * One poll cycle. Overlapping calls are skipped.
   */
  async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;

    const seen = new Set<string>();
    try {
      for (const session of this.sessions) {
        let responses: PromptRecord[];
        try {
          responses = await this.channel.fetchResponses(session.id);
        } catch (error) {
          this.log.warn({ sessionId: session.id, error: errorMessage(error) }, "Response fetch failed");
          continue;
        }

        for (const prompt of responses) {
          seen.add(prompt.id);

          if (this.processed.has(prompt.id)) {
            // Delivered earlier; the remote delete did not go through
            await this.channel.deletePrompt(prompt.id);
            continue;
          }

          this.processed.add(prompt.id);
          await this.deliver(session, prompt);
        }
      }
      this.prune(seen);
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Response poll failed");
    } finally {
      this.polling = false;
    }
  }

  private async deliver(session: LocalSession, prompt: PromptRecord): Promise<DeliveryPath | null> {
    const text = prompt.responseText;
    if (!text) {
      this.log.warn({ promptId: prompt.id }, "Answered prompt has no response text");
      await this.channel.deletePrompt(prompt.id);
      return null;
    }

    let path: DeliveryPath;
    const result = await this.injector.inject(text, session.pid ?? prompt.pid);
    if (result.ok) {
      path = "injected";
      this.denialReported = false;
    } else {
      path = "fallback";
      if (result.error.kind === "denied" && !this.denialReported) {
        this.denialReported = true;
        await this.notifier.notify({ title: "Permission required", body: DENIAL_REMEDIATION });
      }
      await this.fallback.deliver(session.id, session.project, text);
    }

    // Input reached the user either way, so the session is working again
    try {
      await this.scanner.markWorking(session);
      await this.scanner.removePrompt(session.id);
    } catch (error) {
      this.log.warn({ sessionId: session.id, error: errorMessage(error) }, "Failed to update local files");
    }

    await this.channel.deletePrompt(prompt.id);
    this.log.info(
      { promptId: prompt.id, sessionId: session.id, path, from: prompt.respondedFromDevice },
      "Response delivered"
    );
    return path;
  }

  /**
   * Forget ids the store stopped returning, oldest first, once over the limit
   */
  private prune(seen: Set<string>): void {
    if (this.processed.size <= this.processedLimit) return;

    for (const id of this.processed) {
      if (this.processed.size <= this.processedLimit) break;
      if (!seen.has(id)) this.processed.delete(id);
    }
  }
}
