/**
 * Centralized utility exports
 */

export { logger, createLogger, errorMessage, type LogLevel } from "./logger";
export { createLockManager, isProcessRunning, setupShutdown, type LockManager } from "./lock";
export { MessageQueue } from "./queue";
export { sendResponse, splitMessage, formatAge, truncate } from "./telegram";
export { CommandError, runCommand, type CommandResult, type CommandRunner } from "./command";
export { StoreError, InjectionError, isStoreError } from "./errors";
export type { InjectionFailureKind, StoreErrorCode } from "./errors";
export {
  parseSessionId,
  promptFileName,
  responseFileName,
  sessionIdFromStatusFile,
  statusFileName,
} from "./session-id";
