/**
 * Configuration schema validation with Zod
 */

import { hostname } from "os";
import { join } from "path";
import { z } from "zod";

const homeDir = process.env["HOME"] || "~";
const defaultDataDir = join(homeDir, ".session-beacon");

function defaultInjectionMethod(): "osascript" | "tmux" {
  return process.platform === "darwin" ? "osascript" : "tmux";
}

const positiveMs = z.number().int().positive();

export const configSchema = z
  .object({
    role: z.enum(["source", "remote"]).default("source").describe("Process role"),

    deviceName: z.string().min(1).default(hostname()).describe("Device name shown remotely"),

    storeBackend: z.enum(["firestore", "memory"]).default("firestore").describe("Remote store"),

    firebaseProjectId: z.string().optional().describe("Firebase project id"),

    collectionPrefix: z
      .string()
      .regex(/^[A-Za-z0-9_-]*$/, "FIRESTORE_COLLECTION_PREFIX may only contain letters, digits, _ and -")
      .default("")
      .describe("Firestore collection prefix"),

    statusDir: z.string().default("/tmp").describe("Directory of hook status files"),

    responseDir: z.string().default("/tmp").describe("Directory of fallback response files"),

    statusFilePrefix: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9._-]+$/, "STATUS_FILE_PREFIX may only contain letters, digits, ., _ and -")
      .default("beacon-")
      .describe("Status file name prefix"),

    pollIntervalMs: positiveMs.default(1000).describe("Local polling interval"),

    uploadDebounceMs: positiveMs.default(500).describe("Upload debounce delay"),

    responsePollIntervalMs: positiveMs.default(2000).describe("Response poll interval"),

    remoteRefreshIntervalMs: positiveMs.default(5000).describe("Remote fallback refresh interval"),

    sessionExpirationMs: positiveMs.default(30 * 60 * 1000).describe("Remote query window"),

    localSessionTimeoutMs: positiveMs.default(2 * 60 * 60 * 1000).describe("Local status file TTL"),

    pidCheckAfterMs: positiveMs.default(60 * 1000).describe("Age before checking the session pid"),

    cleanupEveryTicks: z.number().int().positive().default(10).describe("Ticks between sweeps"),

    queryPageSize: z.number().int().min(1).max(500).default(100).describe("Remote query page size"),

    injectionMethod: z
      .enum(["osascript", "tmux", "none"])
      .default(defaultInjectionMethod())
      .describe("Local response delivery"),

    botToken: z.string().default("").describe("Telegram bot token"),

    allowedUserId: z.string().default("").describe("Telegram user allowed to use the console"),

    dataDir: z.string().default(defaultDataDir).describe("Base directory for local state"),

    nodeEnv: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Environment mode"),

    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info").describe("Log level"),
  })
  .superRefine((config, ctx) => {
    // A debounce at or above the poll interval is cancelled by every tick and never fires
    if (config.uploadDebounceMs >= config.pollIntervalMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["uploadDebounceMs"],
        message: "UPLOAD_DEBOUNCE_MS must be lower than POLL_INTERVAL_MS",
      });
    }

    if (config.role === "remote" && !config.botToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["botToken"],
        message: "TELEGRAM_BOT_TOKEN is required for the remote role",
      });
    }

    if (config.storeBackend === "firestore" && !config.firebaseProjectId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["firebaseProjectId"],
        message: "FIREBASE_PROJECT_ID is required for the firestore backend",
      });
    }
  });

export type ConfigInput = z.input<typeof configSchema>;
export type ConfigOutput = z.output<typeof configSchema>;

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return Number.parseInt(raw, 10);
}

function readString(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Parse environment variables into config input.
 * Enum values are passed through as strings and checked by the schema.
 */
export function parseEnvVars(): Record<keyof ConfigInput, unknown> {
  return {
    role: readString("SYNC_ROLE"),
    deviceName: readString("DEVICE_NAME"),
    storeBackend: readString("STORE_BACKEND"),
    firebaseProjectId:
      readString("FIREBASE_PROJECT_ID") ?? readString("GCLOUD_PROJECT"),
    collectionPrefix: readString("FIRESTORE_COLLECTION_PREFIX"),
    statusDir: readString("STATUS_DIR"),
    responseDir: readString("RESPONSE_DIR"),
    statusFilePrefix: readString("STATUS_FILE_PREFIX"),
    pollIntervalMs: readInt("POLL_INTERVAL_MS"),
    uploadDebounceMs: readInt("UPLOAD_DEBOUNCE_MS"),
    responsePollIntervalMs: readInt("RESPONSE_POLL_INTERVAL_MS"),
    remoteRefreshIntervalMs: readInt("REMOTE_REFRESH_INTERVAL_MS"),
    sessionExpirationMs: readInt("SESSION_EXPIRATION_MS"),
    localSessionTimeoutMs: readInt("LOCAL_SESSION_TIMEOUT_MS"),
    pidCheckAfterMs: readInt("PID_CHECK_AFTER_MS"),
    cleanupEveryTicks: readInt("CLEANUP_EVERY_TICKS"),
    queryPageSize: readInt("QUERY_PAGE_SIZE"),
    injectionMethod: readString("INJECTION_METHOD"),
    botToken: readString("TELEGRAM_BOT_TOKEN"),
    allowedUserId: readString("TELEGRAM_USER_ID"),
    dataDir: readString("DATA_DIR"),
    nodeEnv: readString("NODE_ENV"),
    logLevel: readString("LOG_LEVEL"),
  };
}
