/**
 * Configuration loader tests
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig, validateConfig } from "../../../src/config";
import { mockEnv } from "../../setup";

describe("Config Loader", () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = mockEnv();
  });

  afterEach(() => {
    restoreEnv();
  });

  function withEnv(overrides: Record<string, string | undefined>) {
    restoreEnv();
    restoreEnv = mockEnv(overrides);
  }

  test("loads valid configuration", () => {
    const config = loadConfig();

    expect(config.role).toBe("source");
    expect(config.deviceName).toBe("test-laptop");
    expect(config.storeBackend).toBe("memory");
    expect(config.statusDir).toBe("/tmp/test-beacon");
    expect(config.nodeEnv).toBe("test");
  });

  test("derives the lock file from the role", () => {
    expect(loadConfig().lockFile).toBe("/tmp/test-beacon-data/source.lock");

    withEnv({ SYNC_ROLE: "remote", TELEGRAM_BOT_TOKEN: "test-bot-token" });
    expect(loadConfig().lockFile).toBe("/tmp/test-beacon-data/remote.lock");
  });

  test("uses sync defaults", () => {
    const config = loadConfig();

    expect(config.pollIntervalMs).toBe(1000);
    expect(config.uploadDebounceMs).toBe(500);
    expect(config.responsePollIntervalMs).toBe(2000);
    expect(config.remoteRefreshIntervalMs).toBe(5000);
    expect(config.sessionExpirationMs).toBe(1800000);
    expect(config.localSessionTimeoutMs).toBe(7200000);
    expect(config.pidCheckAfterMs).toBe(60000);
    expect(config.cleanupEveryTicks).toBe(10);
    expect(config.queryPageSize).toBe(100);
    expect(config.statusFilePrefix).toBe("beacon-");
    expect(config.collectionPrefix).toBe("");
  });

  test("reads intervals from environment", () => {
    withEnv({ POLL_INTERVAL_MS: "2000", UPLOAD_DEBOUNCE_MS: "750" });

    const config = loadConfig();

    expect(config.pollIntervalMs).toBe(2000);
    expect(config.uploadDebounceMs).toBe(750);
  });

  test("rejects a debounce that is not below the poll interval", () => {
    withEnv({ POLL_INTERVAL_MS: "1000", UPLOAD_DEBOUNCE_MS: "1000" });

    expect(() => loadConfig()).toThrow("UPLOAD_DEBOUNCE_MS must be lower than POLL_INTERVAL_MS");
  });

  test("rejects non-numeric intervals", () => {
    withEnv({ POLL_INTERVAL_MS: "soon" });

    expect(() => loadConfig()).toThrow("Configuration validation failed");
  });

  test("requires a bot token for the remote role", () => {
    withEnv({ SYNC_ROLE: "remote" });

    expect(() => loadConfig()).toThrow("TELEGRAM_BOT_TOKEN is required for the remote role");
  });

  test("requires a project id for the firestore backend", () => {
    withEnv({ STORE_BACKEND: "firestore" });

    expect(() => loadConfig()).toThrow("FIREBASE_PROJECT_ID is required for the firestore backend");
  });

  test("falls back to GCLOUD_PROJECT for the project id", () => {
    withEnv({ STORE_BACKEND: "firestore", GCLOUD_PROJECT: "demo-project" });

    expect(loadConfig().firebaseProjectId).toBe("demo-project");
  });

  test("rejects an unknown injection method", () => {
    withEnv({ INJECTION_METHOD: "applescript" });

    expect(() => loadConfig()).toThrow("injectionMethod");
  });

  test("validateConfig reports errors without throwing", () => {
    withEnv({ SYNC_ROLE: "observer" });

    const result = validateConfig();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]).toContain("role");
    }
  });
});
