/**
 * Session Beacon - Entry Point
 *
 * Validates configuration, takes the role's lock, builds the store and
 * starts either the source agent or the remote monitor with its console.
 *
 * Run: npm run start
 */

import { mkdir } from "fs/promises";
import { Api, Bot } from "grammy";

import { validateConfig } from "./config";
import {
  CleanupSweep,
  Clipboard,
  FallbackDelivery,
  LogNotifier,
  PromptChannel,
  PromptPublisher,
  RemoteConsole,
  RemoteMonitor,
  ResponsePoller,
  SessionQueryEngine,
  SourceAgent,
  StatusScanner,
  SubscriptionBridge,
  TelegramNotifier,
  TerminalInjector,
  UploadPipeline,
  type Notifier,
} from "./services";
import { createRecordStore, type SyncStore } from "./store";
import type { AppConfig } from "./types";
import { createLockManager, createLogger, errorMessage, setupShutdown } from "./utils";

const log = createLogger("main");

function createNotifier(config: AppConfig): Notifier {
  if (config.botToken && config.allowedUserId) {
    return new TelegramNotifier(new Api(config.botToken), config.allowedUserId, createLogger("notifier"));
  }
  return new LogNotifier(createLogger("notifier"));
}

async function startSource(config: AppConfig, store: SyncStore): Promise<() => Promise<void>> {
  const notifier = createNotifier(config);
  const queries = new SessionQueryEngine(store, config, createLogger("query"), notifier);
  const channel = new PromptChannel(store, createLogger("prompts"), config.queryPageSize);
  const scanner = new StatusScanner(config, createLogger("scanner"));

  const injector = new TerminalInjector(config.injectionMethod, createLogger("injector"));
  const capability = await injector.probe();
  log.info({ method: config.injectionMethod, capability }, "Injection capability");

  const agent = new SourceAgent(
    {
      scanner,
      pipeline: new UploadPipeline(store, config, createLogger("upload")),
      publisher: new PromptPublisher(scanner, channel, createLogger("publisher")),
      poller: new ResponsePoller(
        channel,
        scanner,
        injector,
        new FallbackDelivery(config, new Clipboard(), notifier, createLogger("fallback")),
        notifier,
        config,
        createLogger("responder")
      ),
      cleanup: new CleanupSweep(store, queries, createLogger("cleanup")),
    },
    config,
    createLogger("source")
  );

  await agent.start();
  return () => agent.stop();
}

async function startRemote(config: AppConfig, store: SyncStore): Promise<() => Promise<void>> {
  const bot = new Bot(config.botToken);
  const notifier = new TelegramNotifier(bot.api, config.allowedUserId, createLogger("notifier"));
  const queries = new SessionQueryEngine(store, config, createLogger("query"), notifier);
  const channel = new PromptChannel(store, createLogger("prompts"), config.queryPageSize);
  const bridge = new SubscriptionBridge(store, store, queries, channel, createLogger("bridge"));
  const monitor = new RemoteMonitor(queries, channel, bridge, config, createLogger("monitor"));
  const consoleBot = new RemoteConsole(bot, monitor, channel, config, createLogger("console"));

  await monitor.start();
  consoleBot.start();

  return async () => {
    monitor.stop();
    await consoleBot.stop();
  };
}

async function main(): Promise<void> {
  // Validate configuration
  const validation = validateConfig();
  if (!validation.success) {
    console.error("Configuration error:");
    for (const error of validation.errors) {
      console.error(error);
    }
    console.log("\nSetup instructions:");
    console.log("1. Copy .env.example to .env");
    console.log("2. Set FIREBASE_PROJECT_ID, or STORE_BACKEND=memory for a local trial");
    console.log("3. For SYNC_ROLE=remote, set TELEGRAM_BOT_TOKEN and TELEGRAM_USER_ID");
    process.exit(1);
  }

  const config = validation.config;
  log.info(
    { role: config.role, deviceName: config.deviceName, nodeEnv: config.nodeEnv },
    "Configuration loaded"
  );

  await mkdir(config.dataDir, { recursive: true });

  // Acquire lock
  const lockManager = createLockManager(config.lockFile);
  if (!(await lockManager.acquire())) {
    log.error({ role: config.role }, "Could not acquire lock. Another instance may be running.");
    process.exit(1);
  }
  log.debug("Lock acquired");

  const store = createRecordStore(config, createLogger("store"));
  if ((await store.checkAvailability()) !== "available") {
    log.warn("Store is not reachable yet; syncing will resume once it is");
  }

  const stop =
    config.role === "source" ? await startSource(config, store) : await startRemote(config, store);

  setupShutdown(config.lockFile, stop);
}

main().catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, "Fatal error");
  process.exit(1);
});
