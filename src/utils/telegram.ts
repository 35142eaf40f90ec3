/**
 * Telegram formatting helpers
 */

import type { Context } from "grammy";

/** Telegram message character limit */
const MAX_MESSAGE_LENGTH = 4000;

/**
 * Send a response, chunking if necessary to stay within Telegram limits
 */
export async function sendResponse(ctx: Context, response: string): Promise<void> {
  for (const chunk of splitMessage(response, MAX_MESSAGE_LENGTH)) {
    await ctx.reply(chunk);
  }
}

/**
 * Split a message into chunks at natural boundaries
 * (paragraphs, then lines, then words)
 */
export function splitMessage(text: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    let splitIndex = remaining.lastIndexOf("\n\n", maxLength);
    if (splitIndex <= 0) {
      splitIndex = remaining.lastIndexOf("\n", maxLength);
    }
    if (splitIndex <= 0) {
      splitIndex = remaining.lastIndexOf(" ", maxLength);
    }
    if (splitIndex <= 0) {
      splitIndex = maxLength;
    }

    chunks.push(remaining.substring(0, splitIndex));
    remaining = remaining.substring(splitIndex).trim();
  }

  return chunks;
}

/**
 * Compact age of a timestamp, e.g. "just now", "45s ago", "12m ago", "3h ago"
 */
export function formatAge(date: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  if (seconds < 5) return "just now";
  if (seconds < 60) return `${seconds}s ago`;

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;

  return `${Math.floor(minutes / 60)}h ago`;
}

/**
 * Shorten text to `max` characters, ending with an ellipsis when cut
 */
export function truncate(text: string, max: number): string {
  const clean = text.trim();
  return clean.length <= max ? clean : `${clean.slice(0, max - 1).trimEnd()}…`;
}
