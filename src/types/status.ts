/**
 * Session status values shared by every device
 */

export const SESSION_STATUSES = ["working", "idle", "needs_input", "not_running"] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export interface StatusPresentation {
  /** Human-readable name */
  name: string;

  /** Short marker used in chat alerts */
  emoji: string;
}

export const STATUS_PRESENTATION: Record<SessionStatus, StatusPresentation> = {
  working: { name: "Working", emoji: "⚙️" },
  idle: { name: "Ready", emoji: "✅" },
  needs_input: { name: "Needs Input", emoji: "❓" },
  not_running: { name: "Not Running", emoji: "⭕" },
};
