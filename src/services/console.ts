/**
 * RemoteConsole - Telegram front end of a remote device
 *
 * /sessions   active sessions across all sources
 * /prompts    prompts waiting for an answer
 * /reply <promptId> <text>
 *
 * Monitor alerts are forwarded to the configured user's chat.
 */

import type { Bot } from "grammy";
import type { Logger } from "pino";
import type { AppConfig, PromptRecord, SessionRecord } from "../types";
import { STATUS_PRESENTATION } from "../types";
import { errorMessage } from "../utils/logger";
import { MessageQueue } from "../utils/queue";
import { formatAge, sendResponse, splitMessage, truncate } from "../utils/telegram";
import type { PromptChannel } from "./prompts";
import type { MonitorAlert, RemoteMonitor } from "./remote";

export type ConsoleConfig = Pick<AppConfig, "allowedUserId" | "deviceName">;

const MAX_PROMPT_PREVIEW = 300;
const MAX_MESSAGE_LENGTH = 4000;

const HELP_TEXT = [
  "Session Beacon",
  "",
  "/sessions - active sessions",
  "/prompts - prompts waiting for you",
  "/reply <promptId> <text> - answer a prompt",
].join("\n");

export function formatSessions(sessions: SessionRecord[], now: Date = new Date()): string {
  if (sessions.length === 0) return "No active sessions.";

  const lines = sessions.map((s) => {
    const { emoji, name } = STATUS_PRESENTATION[s.status];
    return `${emoji} ${s.project} · ${name} · ${s.sourceDeviceName} · ${formatAge(s.timestamp, now)}`;
  });
  return [`Active sessions (${sessions.length}):`, ...lines].join("\n");
}

export function formatPrompts(prompts: PromptRecord[], now: Date = new Date()): string {
  if (prompts.length === 0) return "No prompts waiting.";

  return prompts
    .map((p) =>
      [
        `${STATUS_PRESENTATION.needs_input.emoji} ${p.project} · ${formatAge(p.timestamp, now)}`,
        truncate(p.promptMessage, MAX_PROMPT_PREVIEW),
        `/reply ${p.id} <text>`,
      ].join("\n")
    )
    .join("\n\n");
}

export function formatAlert(alert: MonitorAlert): string {
  if (alert.kind === "status") {
    const { session } = alert;
    const { emoji, name } = STATUS_PRESENTATION[session.status];
    return `${emoji} ${session.project} is now ${name} (${session.sourceDeviceName})`;
  }

  const { prompt } = alert;
  return [
    `${STATUS_PRESENTATION.needs_input.emoji} ${prompt.project} needs input`,
    truncate(prompt.promptMessage, MAX_PROMPT_PREVIEW),
    "",
    `/reply ${prompt.id} <text>`,
  ].join("\n");
}

/**
 * Split "/reply" arguments into prompt id and response text
 */
export function parseReplyCommand(args: string): { promptId: string; text: string } | null {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(args.trim());
  if (!match) return null;

  const [, promptId, text] = match;
  if (!promptId || !text?.trim()) return null;
  return { promptId, text: text.trim() };
}

/**
 * Submit a /reply and describe the outcome for the chat
 */
export async function handleReply(
  channel: Pick<PromptChannel, "submitResponse">,
  deviceName: string,
  args: string
): Promise<string> {
  const parsed = parseReplyCommand(args);
  if (!parsed) return "Usage: /reply <promptId> <text>";

  const sent = await channel.submitResponse(parsed.promptId, parsed.text, deviceName);
  return sent
    ? "Response sent. It will be typed into the session shortly."
    : "Could not send the response. The prompt may be gone or already answered.";
}

export class RemoteConsole {
  private bot: Bot;
  private monitor: RemoteMonitor;
  private channel: PromptChannel;
  private config: ConsoleConfig;
  private log: Logger;
  private queue: MessageQueue;
  private detachAlerts: (() => void) | null = null;

  constructor(
    bot: Bot,
    monitor: RemoteMonitor,
    channel: PromptChannel,
    config: ConsoleConfig,
    logger: Logger
  ) {
    this.bot = bot;
    this.monitor = monitor;
    this.channel = channel;
    this.config = config;
    this.log = logger;
    this.queue = new MessageQueue(logger);
    this.registerHandlers();
  }

  start(): void {
    if (!this.config.allowedUserId) {
      this.log.warn("TELEGRAM_USER_ID is not set; the console will refuse every user");
    }

    this.detachAlerts = this.monitor.onAlert((alert) => this.sendAlert(alert));

    this.bot
      .start({
        onStart: () => {
          this.log.info({ allowedUserId: this.config.allowedUserId || "NONE" }, "Console bot is running");
        },
      })
      .catch((error: unknown) => {
        this.log.error({ error: errorMessage(error) }, "Console bot stopped with an error");
      });
  }

  async stop(): Promise<void> {
    this.detachAlerts?.();
    this.detachAlerts = null;
    await this.bot.stop();
    await this.queue.drain();
  }

  private registerHandlers(): void {
    // Auth middleware
    this.bot.use(async (ctx, next) => {
      const userId = ctx.from?.id.toString();

      if (!this.config.allowedUserId || userId !== this.config.allowedUserId) {
        this.log.warn({ userId }, "Unauthorized access attempt");
        await ctx.reply("This bot is private.");
        return;
      }

      await next();
    });

    this.bot.command(["start", "help"], async (ctx) => {
      await ctx.reply(HELP_TEXT);
    });

    this.bot.command("sessions", async (ctx) => {
      await sendResponse(ctx, formatSessions(this.monitor.getSessions()));
    });

    this.bot.command("prompts", async (ctx) => {
      await sendResponse(ctx, formatPrompts(this.monitor.getPendingPrompts()));
    });

    this.bot.command("reply", async (ctx) => {
      const args = ctx.match;
      this.queue.enqueue(async () => {
        await ctx.reply(await handleReply(this.channel, this.config.deviceName, args));
      });
    });

    this.bot.catch((err) => {
      this.log.error({ error: errorMessage(err.error) }, "Console handler failed");
    });
  }

  private sendAlert(alert: MonitorAlert): void {
    const chatId = this.config.allowedUserId;
    if (!chatId) return;

    this.queue.enqueue(async () => {
      for (const chunk of splitMessage(formatAlert(alert), MAX_MESSAGE_LENGTH)) {
        await this.bot.api.sendMessage(chatId, chunk);
      }
    });
  }
}
