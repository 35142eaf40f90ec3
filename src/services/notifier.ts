/**
 * User-facing notifications from the source side
 */

import type { Api } from "grammy";
import type { Logger } from "pino";
import { errorMessage } from "../utils/logger";
import { splitMessage } from "../utils/telegram";

export interface UserNotification {
  title: string;
  body: string;
}

export interface Notifier {
  notify(notification: UserNotification): Promise<void>;
}

/** Telegram message character limit */
const MAX_MESSAGE_LENGTH = 4000;

/**
 * Deliver notifications as Telegram messages to the configured user.
 * Send failures are logged; a notification is never worth failing a cycle.
 */
export class TelegramNotifier implements Notifier {
  private api: Api;
  private chatId: string;
  private log: Logger;

  constructor(api: Api, chatId: string, logger: Logger) {
    this.api = api;
    this.chatId = chatId;
    this.log = logger;
  }

  async notify(notification: UserNotification): Promise<void> {
    const text = `${notification.title}\n\n${notification.body}`;
    try {
      for (const chunk of splitMessage(text, MAX_MESSAGE_LENGTH)) {
        await this.api.sendMessage(this.chatId, chunk);
      }
    } catch (error) {
      this.log.warn(
        { title: notification.title, error: errorMessage(error) },
        "Failed to send notification"
      );
    }
  }
}

/**
 * Notifier used when no chat is configured
 */
export class LogNotifier implements Notifier {
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  async notify(notification: UserNotification): Promise<void> {
    this.log.warn({ title: notification.title }, notification.body);
  }
}
