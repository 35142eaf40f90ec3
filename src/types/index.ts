/**
 * Centralized type exports
 */

export type { AppConfig, InjectionMethod, StoreBackend, SyncRole } from "./config";
export type {
  LocalSession,
  ScanResult,
  SessionId,
  SessionRecord,
  StatusFileData,
} from "./session";
export type { PromptFileData, PromptRecord, PublishOutcome } from "./prompt";
export type {
  AvailabilityStatus,
  ChangeKind,
  ChangeNotification,
  ComparisonOperator,
  FieldPredicate,
  FieldValue,
  NotificationHandler,
  PushChannel,
  QueryPage,
  RecordFields,
  RecordQuery,
  RecordStore,
  RecordType,
  StoredRecord,
  SubscriptionSpec,
} from "./store";
export type { SessionStatus, StatusPresentation } from "./status";
export { SESSION_STATUSES, STATUS_PRESENTATION } from "./status";
