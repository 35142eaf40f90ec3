/**
 * Session id canonicalization
 *
 * Status files are named `<prefix><sessionId>.json`. Every component that
 * talks to the store goes through these helpers, so the id published with a
 * session and the id a prompt is filed under can never drift apart.
 */

import type { SessionId } from "../types";

const SESSION_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const STATUS_FILE_EXTENSION = ".json";

function isSessionId(raw: string): raw is SessionId {
  return SESSION_ID_PATTERN.test(raw);
}

/**
 * Validate an id read from the store or typed by a user
 */
export function parseSessionId(raw: string): SessionId | null {
  const trimmed = raw.trim();
  return isSessionId(trimmed) ? trimmed : null;
}

/**
 * Prefix of prompt files, which share the status directory
 */
export function promptFilePrefix(statusPrefix: string): string {
  return `${statusPrefix}prompt-`;
}

/**
 * Prefix of fallback response files
 */
export function responseFilePrefix(statusPrefix: string): string {
  return `${statusPrefix}response-`;
}

/**
 * Extract the session id from a status file name.
 * Returns null for prompt/response files and anything else in the directory.
 */
export function sessionIdFromStatusFile(filename: string, statusPrefix: string): SessionId | null {
  if (!filename.startsWith(statusPrefix) || !filename.endsWith(STATUS_FILE_EXTENSION)) {
    return null;
  }
  if (
    filename.startsWith(promptFilePrefix(statusPrefix)) ||
    filename.startsWith(responseFilePrefix(statusPrefix))
  ) {
    return null;
  }

  const raw = filename.slice(statusPrefix.length, -STATUS_FILE_EXTENSION.length);
  return raw ? parseSessionId(raw) : null;
}

export function statusFileName(id: SessionId, statusPrefix: string): string {
  return `${statusPrefix}${id}${STATUS_FILE_EXTENSION}`;
}

export function promptFileName(id: SessionId, statusPrefix: string): string {
  return `${promptFilePrefix(statusPrefix)}${id}${STATUS_FILE_EXTENSION}`;
}

export function responseFileName(id: SessionId, statusPrefix: string): string {
  return `${responseFilePrefix(statusPrefix)}${id}.txt`;
}
