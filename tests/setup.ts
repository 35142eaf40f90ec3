/**
 * Test setup and fixtures
 */

import pino from "pino";
import type { Notifier, UserNotification } from "../src/services/notifier";
import type {
  AppConfig,
  LocalSession,
  PromptRecord,
  SessionId,
  SessionStatus,
} from "../src/types";
import type { CommandResult, CommandRunner } from "../src/utils/command";
import { parseSessionId } from "../src/utils/session-id";

/**
 * Mock environment variables for tests
 */
export function mockEnv(overrides: Record<string, string | undefined> = {}) {
  const originalEnv = { ...process.env };

  const testEnv: Record<string, string | undefined> = {
    SYNC_ROLE: "source",
    DEVICE_NAME: "test-laptop",
    STORE_BACKEND: "memory",
    FIREBASE_PROJECT_ID: undefined,
    GCLOUD_PROJECT: undefined,
    STATUS_DIR: "/tmp/test-beacon",
    TELEGRAM_BOT_TOKEN: undefined,
    TELEGRAM_USER_ID: undefined,
    POLL_INTERVAL_MS: undefined,
    UPLOAD_DEBOUNCE_MS: undefined,
    INJECTION_METHOD: undefined,
    DATA_DIR: "/tmp/test-beacon-data",
    NODE_ENV: "test",
    LOG_LEVEL: "error", // Suppress logs in tests
    ...overrides,
  };

  for (const [key, value] of Object.entries(testEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  return () => {
    // Restore original environment
    for (const key of Object.keys(testEnv)) {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    }
  };
}

/**
 * Logger that drops everything
 */
export function createTestLogger() {
  return pino({ level: "silent" });
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    role: "source",
    deviceName: "test-laptop",
    storeBackend: "memory",
    collectionPrefix: "",
    statusDir: "/tmp/test-beacon",
    responseDir: "/tmp/test-beacon",
    statusFilePrefix: "beacon-",
    pollIntervalMs: 1000,
    uploadDebounceMs: 500,
    responsePollIntervalMs: 2000,
    remoteRefreshIntervalMs: 5000,
    sessionExpirationMs: 30 * 60 * 1000,
    localSessionTimeoutMs: 2 * 60 * 60 * 1000,
    pidCheckAfterMs: 60 * 1000,
    cleanupEveryTicks: 10,
    queryPageSize: 100,
    injectionMethod: "none",
    botToken: "",
    allowedUserId: "",
    dataDir: "/tmp/test-beacon-data",
    lockFile: "/tmp/test-beacon-data/source.lock",
    nodeEnv: "test",
    logLevel: "error",
    ...overrides,
  };
}

/**
 * Canonical session id for fixtures; throws on an invalid literal
 */
export function sid(raw: string): SessionId {
  const id = parseSessionId(raw);
  if (!id) throw new Error(`Invalid test session id: ${raw}`);
  return id;
}

export function localSession(
  raw: string,
  status: SessionStatus,
  overrides: Partial<Omit<LocalSession, "id" | "status">> = {}
): LocalSession {
  return {
    id: sid(raw),
    status,
    project: "demo",
    timestamp: new Date(),
    ...overrides,
  };
}

export function promptRecord(
  rawSessionId: string,
  overrides: Partial<Omit<PromptRecord, "sessionId">> = {}
): PromptRecord {
  const timestamp = overrides.timestamp ?? new Date("2026-01-01T10:00:00Z");
  return {
    id: `${rawSessionId}-${timestamp.getTime()}`,
    sessionId: sid(rawSessionId),
    project: "demo",
    promptMessage: "Allow edit of src/app.ts?",
    notificationType: "permission_prompt",
    responded: false,
    ...overrides,
    timestamp,
  };
}

/**
 * Notifier that records what it was asked to send
 */
export class RecordingNotifier implements Notifier {
  notifications: UserNotification[] = [];

  async notify(notification: UserNotification): Promise<void> {
    this.notifications.push(notification);
  }
}

export interface RecordedCommand {
  command: string;
  args: string[];
  input?: string;
}

/**
 * CommandRunner stand-in. `respond` decides each call's outcome and may throw.
 */
export function createFakeRunner(
  respond: (call: RecordedCommand) => CommandResult | Promise<CommandResult> = () => ({
    stdout: "",
    stderr: "",
  })
) {
  const calls: RecordedCommand[] = [];
  const run: CommandRunner = async (command, args, options) => {
    const call: RecordedCommand = { command, args, input: options?.input };
    calls.push(call);
    return respond(call);
  };
  return { run, calls };
}
