/**
 * Prompt types for the remote response round trip
 */

import type { SessionId } from "./session";

export interface PromptRecord {
  /** Unique per prompt occurrence */
  id: string;

  /** Canonical id of the session waiting for input */
  sessionId: SessionId;

  project: string;
  promptMessage: string;
  notificationType: string;
  transcriptPath?: string;
  transcriptExcerpt?: string;

  /** When the prompt was raised */
  timestamp: Date;

  pid?: number;

  /** Flips false to true once, never back */
  responded: boolean;

  responseText?: string;
  respondedAt?: Date;
  respondedFromDevice?: string;
}

/** Raw prompt file contents as written by the CLI hook */
export interface PromptFileData {
  session_id: string;
  project: string;
  prompt_message: string;
  notification_type: string;
  transcript_path?: string;
  transcript_excerpt?: string;
  timestamp: string;
  pid?: number;
}

export type PublishOutcome = "created" | "exists" | "skipped";
