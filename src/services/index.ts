/**
 * Service module exports
 */

export { UploadPipeline, type UploadConfig, type UpsertOutcome } from "./upload";
export { SessionQueryEngine, type QueryConfig } from "./query";
export {
  SubscriptionBridge,
  SESSION_SUBSCRIPTION,
  PROMPT_SUBSCRIPTION,
  type BridgeEvent,
  type BridgeListener,
} from "./subscription";
export { PromptChannel } from "./prompts";
export { PromptPublisher, buildPromptRecord } from "./publisher";
export { ResponsePoller, type DeliveryPath, type ResponderConfig } from "./responder";
export {
  TerminalInjector,
  escapeAppleScript,
  keystrokeScript,
  type InjectionCapability,
  type InjectionResult,
} from "./injector";
export { Clipboard, clipboardCommands } from "./clipboard";
export { FallbackDelivery, type FallbackResult } from "./fallback";
export {
  LogNotifier,
  TelegramNotifier,
  type Notifier,
  type UserNotification,
} from "./notifier";
export { StatusScanner, aggregateStatus } from "./status";
export { CleanupSweep } from "./cleanup";
export { SourceAgent, type SourceAgentDeps } from "./source";
export { RemoteMonitor, type MonitorAlert } from "./remote";
export {
  RemoteConsole,
  formatAlert,
  formatPrompts,
  formatSessions,
  handleReply,
  parseReplyCommand,
} from "./console";
