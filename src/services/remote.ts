/**
 * RemoteMonitor - live view of every source's sessions and pending prompts
 *
 * Push notifications from the bridge update single records as they change;
 * a fixed-interval refresh catches anything a dropped push missed.
 */

import type { Logger } from "pino";
import type { AppConfig, PromptRecord, SessionRecord, SessionStatus } from "../types";
import { errorMessage } from "../utils/logger";
import type { PromptChannel } from "./prompts";
import type { SessionQueryEngine } from "./query";
import type { BridgeEvent, SubscriptionBridge } from "./subscription";

export type RemoteConfig = Pick<AppConfig, "remoteRefreshIntervalMs">;

export type MonitorAlert =
  | { kind: "status"; session: SessionRecord; previous: SessionStatus }
  | { kind: "prompt"; prompt: PromptRecord };

export type AlertListener = (alert: MonitorAlert) => void;

const ALERT_STATUSES: ReadonlySet<SessionStatus> = new Set(["needs_input", "idle"]);

export class RemoteMonitor {
  private queries: SessionQueryEngine;
  private prompts: PromptChannel;
  private bridge: SubscriptionBridge;
  private config: RemoteConfig;
  private log: Logger;

  private sessions = new Map<string, SessionRecord>();
  private pending = new Map<string, PromptRecord>();
  private alerted = new Set<string>();
  private listeners = new Set<AlertListener>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private detach: (() => void) | null = null;
  private refreshing = false;

  constructor(
    queries: SessionQueryEngine,
    prompts: PromptChannel,
    bridge: SubscriptionBridge,
    config: RemoteConfig,
    logger: Logger
  ) {
    this.queries = queries;
    this.prompts = prompts;
    this.bridge = bridge;
    this.config = config;
    this.log = logger;
  }

  async start(): Promise<void> {
    if (this.timer) return;

    this.detach = this.bridge.onEvent((event) => this.handleEvent(event));
    await this.bridge.register();
    await this.refresh();

    this.timer = setInterval(async () => {
      await this.refresh();
    }, this.config.remoteRefreshIntervalMs);
    this.log.info({ intervalMs: this.config.remoteRefreshIntervalMs }, "Remote monitor started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.detach?.();
    this.detach = null;
  }

  onAlert(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Active sessions, most recently written first
   */
  getSessions(): SessionRecord[] {
    return [...this.sessions.values()].sort(
      (a, b) => b.timestamp.getTime() - a.timestamp.getTime()
    );
  }

  /**
   * Unanswered prompts, newest first
   */
  getPendingPrompts(): PromptRecord[] {
    return [...this.pending.values()].sort(
      (a, b) => b.timestamp.getTime() - a.timestamp.getTime()
    );
  }

  /**
   * Full refresh of sessions and pending prompts
   */
  async refresh(): Promise<void> {
    if (this.refreshing) return;
    this.refreshing = true;

    try {
      if (this.bridge.hasDeferred()) {
        await this.bridge.register();
      }

      let sessions: SessionRecord[];
      try {
        sessions = await this.queries.fetchActiveStrict();
      } catch (error) {
        // Keep the current view until the store answers again
        this.log.warn({ error: errorMessage(error) }, "Active session fetch failed");
        return;
      }
      this.replaceSessions(sessions);

      let prompts: PromptRecord[];
      try {
        prompts = await this.prompts.fetchPendingPrompts();
      } catch (error) {
        this.log.warn({ error: errorMessage(error) }, "Pending prompt fetch failed");
        return;
      }

      this.pending = new Map(prompts.map((p) => [p.id, p]));
      for (const prompt of prompts) {
        this.alertPrompt(prompt);
      }
      for (const id of this.alerted) {
        if (!this.pending.has(id)) this.alerted.delete(id);
      }
    } finally {
      this.refreshing = false;
    }
  }

  handleEvent(event: BridgeEvent): void {
    switch (event.type) {
      case "refresh":
        this.replaceSessions(event.sessions);
        break;
      case "session":
        if (event.record) {
          this.applySession(event.record);
        } else {
          this.sessions.delete(event.id);
        }
        break;
      case "prompt":
        if (event.record && !event.record.responded) {
          this.pending.set(event.id, event.record);
          this.alertPrompt(event.record);
        } else {
          this.pending.delete(event.id);
        }
        break;
    }
  }

  private replaceSessions(sessions: SessionRecord[]): void {
    const previous = this.sessions;
    this.sessions = new Map();
    for (const session of sessions) {
      this.applySession(session, previous.get(session.id));
    }
  }

  private applySession(session: SessionRecord, before = this.sessions.get(session.id)): void {
    this.sessions.set(session.id, session);

    if (before && before.status !== session.status && ALERT_STATUSES.has(session.status)) {
      this.emit({ kind: "status", session, previous: before.status });
    }
  }

  private alertPrompt(prompt: PromptRecord): void {
    if (this.alerted.has(prompt.id)) return;
    this.alerted.add(prompt.id);
    this.emit({ kind: "prompt", prompt });
  }

  private emit(alert: MonitorAlert): void {
    for (const listener of this.listeners) {
      try {
        listener(alert);
      } catch (error) {
        this.log.error({ alert: alert.kind, error: errorMessage(error) }, "Alert listener failed");
      }
    }
  }
}
