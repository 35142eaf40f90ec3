/**
 * SubscriptionBridge - turns store push notifications into targeted refreshes
 *
 * Registration is idempotent by subscription id. A record type that has
 * never been written cannot be subscribed to yet; that subscription is
 * deferred and picked up by the next register() call.
 */

import type { Logger } from "pino";
import type {
  ChangeNotification,
  PromptRecord,
  PushChannel,
  RecordStore,
  SessionRecord,
  SubscriptionSpec,
} from "../types";
import { isStoreError } from "../utils/errors";
import { errorMessage } from "../utils/logger";
import type { PromptChannel } from "./prompts";
import type { SessionQueryEngine } from "./query";

export const SESSION_SUBSCRIPTION: SubscriptionSpec = {
  id: "session-changes",
  recordType: "Session",
  firesOn: ["create", "update", "delete"],
  silent: true,
};

export const PROMPT_SUBSCRIPTION: SubscriptionSpec = {
  id: "prompt-changes",
  recordType: "Prompt",
  firesOn: ["create", "update"],
  silent: true,
};

const SUBSCRIPTIONS = [SESSION_SUBSCRIPTION, PROMPT_SUBSCRIPTION];

/** A changed record, or null when it was deleted or can no longer be read */
export type BridgeEvent =
  | { type: "session"; id: string; record: SessionRecord | null }
  | { type: "prompt"; id: string; record: PromptRecord | null }
  | { type: "refresh"; sessions: SessionRecord[] };

export type BridgeListener = (event: BridgeEvent) => void;

export class SubscriptionBridge {
  private store: RecordStore;
  private push: PushChannel;
  private queries: SessionQueryEngine;
  private prompts: PromptChannel;
  private log: Logger;

  private deferred = new Set<string>();
  private detachers = new Map<string, () => void>();
  private listeners = new Set<BridgeListener>();
  private pending = new Set<Promise<void>>();

  constructor(
    store: RecordStore,
    push: PushChannel,
    queries: SessionQueryEngine,
    prompts: PromptChannel,
    logger: Logger
  ) {
    this.store = store;
    this.push = push;
    this.queries = queries;
    this.prompts = prompts;
    this.log = logger;
  }

  /**
   * Ensure both subscriptions exist and are being listened to.
   * Never throws; failures leave the subscription deferred.
   */
  async register(): Promise<void> {
    let existing: Set<string>;
    try {
      existing = new Set((await this.store.listSubscriptions()).map((s) => s.id));
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Could not list subscriptions");
      for (const spec of SUBSCRIPTIONS) {
        if (!this.detachers.has(spec.id)) this.deferred.add(spec.id);
      }
      return;
    }

    for (const spec of SUBSCRIPTIONS) {
      if (!existing.has(spec.id)) {
        try {
          await this.store.saveSubscription(spec);
          this.log.info({ subscriptionId: spec.id }, "Subscription registered");
        } catch (error) {
          this.deferred.add(spec.id);
          if (isStoreError(error, "not_found")) {
            this.log.debug(
              { subscriptionId: spec.id, recordType: spec.recordType },
              "Record type not created yet, deferring subscription"
            );
          } else {
            this.log.warn(
              { subscriptionId: spec.id, error: errorMessage(error) },
              "Subscription registration failed"
            );
          }
          continue;
        }
      }

      this.deferred.delete(spec.id);
      this.attach(spec);
    }
  }

  hasDeferred(): boolean {
    return this.deferred.size > 0;
  }

  /**
   * Stop listening and remove both subscriptions from the store
   */
  async unregister(): Promise<void> {
    for (const detach of this.detachers.values()) {
      detach();
    }
    this.detachers.clear();

    for (const spec of SUBSCRIPTIONS) {
      try {
        await this.store.deleteSubscription(spec.id);
      } catch (error) {
        if (!isStoreError(error, "not_found")) {
          this.log.warn(
            { subscriptionId: spec.id, error: errorMessage(error) },
            "Failed to remove subscription"
          );
        }
      }
    }
  }

  /**
   * Subscribe to refreshed records. Returns an unsubscribe.
   */
  onEvent(listener: BridgeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  handleNotification(notification: ChangeNotification): void {
    const task = this.refreshFor(notification)
      .catch((error: unknown) => {
        this.log.warn(
          { subscriptionId: notification.subscriptionId, error: errorMessage(error) },
          "Push refresh failed"
        );
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /**
   * Wait for refreshes triggered by notifications received so far
   */
  async settle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  private attach(spec: SubscriptionSpec): void {
    if (this.detachers.has(spec.id)) return;

    const detach = this.push.listen(spec, (notification) => {
      this.handleNotification(notification);
    });
    this.detachers.set(spec.id, detach);
  }

  private async refreshFor(notification: ChangeNotification): Promise<void> {
    const { recordId, recordType, kind } = notification;

    if (recordId === null) {
      this.emit({ type: "refresh", sessions: await this.queries.fetchActiveStrict() });
      return;
    }

    if (recordType === "Session") {
      const record = kind === "delete" ? null : await this.queries.fetchSession(recordId);
      this.emit({ type: "session", id: recordId, record });
    } else {
      const record = kind === "delete" ? null : await this.prompts.fetchPrompt(recordId);
      this.emit({ type: "prompt", id: recordId, record });
    }
  }

  private emit(event: BridgeEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.log.error({ event: event.type, error: errorMessage(error) }, "Bridge listener failed");
      }
    }
  }
}
