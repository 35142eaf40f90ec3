/**
 * SourceAgent - the source-side tick loop
 *
 * scan -> prompts -> upload -> (every N ticks) cleanup, with the response
 * poller running on its own interval beside it.
 */

import type { Logger } from "pino";
import type { AppConfig, LocalSession, SessionId, SessionStatus } from "../types";
import { STATUS_PRESENTATION } from "../types";
import { errorMessage } from "../utils/logger";
import type { CleanupSweep } from "./cleanup";
import type { PromptPublisher } from "./publisher";
import type { ResponsePoller } from "./responder";
import { aggregateStatus, type StatusScanner } from "./status";
import type { UploadPipeline } from "./upload";

export type SourceConfig = Pick<AppConfig, "pollIntervalMs" | "cleanupEveryTicks">;

export interface SourceAgentDeps {
  scanner: StatusScanner;
  pipeline: UploadPipeline;
  publisher: PromptPublisher;
  poller: ResponsePoller;
  cleanup: CleanupSweep;
}

export class SourceAgent {
  private deps: SourceAgentDeps;
  private config: SourceConfig;
  private log: Logger;

  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;
  private ticking = false;
  private previous = new Map<SessionId, SessionStatus>();
  private aggregate: SessionStatus = "not_running";

  constructor(deps: SourceAgentDeps, config: SourceConfig, logger: Logger) {
    this.deps = deps;
    this.config = config;
    this.log = logger;
  }

  get status(): SessionStatus {
    return this.aggregate;
  }

  async start(): Promise<void> {
    if (this.timer) return;

    await this.tick();
    this.timer = setInterval(async () => {
      await this.tick();
    }, this.config.pollIntervalMs);
    this.deps.poller.start();
    this.log.info({ intervalMs: this.config.pollIntervalMs }, "Source agent started");
  }

  /**
   * Halt timers and wait for writes that already started
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.deps.poller.stop();
    this.deps.pipeline.stop();
    await this.deps.pipeline.flush();
    this.log.info("Source agent stopped");
  }

  /**
   * One local polling tick. A tick still running is not overlapped.
   */
  async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;

    try {
      const { sessions, errorCount } = await this.deps.scanner.scan();
      if (errorCount > 0) {
        this.log.debug({ errorCount }, "Some status files could not be read");
      }

      this.trackStatus(sessions);
      this.deps.poller.setSessions(sessions);
      await this.deps.publisher.process(sessions);
      await this.deps.pipeline.publish(sessions);

      this.ticks++;
      if (this.ticks % this.config.cleanupEveryTicks === 0) {
        await this.deps.cleanup.sweep(new Set(sessions.map((s) => s.id)));
      }
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "Tick failed");
    } finally {
      this.ticking = false;
    }
  }

  private trackStatus(sessions: LocalSession[]): void {
    for (const session of sessions) {
      const before = this.previous.get(session.id);
      if (before === "working" && (session.status === "needs_input" || session.status === "idle")) {
        this.log.info(
          { sessionId: session.id, project: session.project },
          `Session is now ${STATUS_PRESENTATION[session.status].name}`
        );
      }
    }
    this.previous = new Map(sessions.map((s) => [s.id, s.status]));

    const aggregate = aggregateStatus(sessions);
    if (aggregate !== this.aggregate) {
      this.log.info({ from: this.aggregate, to: aggregate, sessions: sessions.length }, "Status changed");
      this.aggregate = aggregate;
    }
  }
}
