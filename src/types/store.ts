/**
 * Contract with the remote record store and its push channel
 */

export type RecordType = "Session" | "Prompt";

export type FieldValue = string | number | boolean | Date;
export type RecordFields = Record<string, FieldValue>;

export interface StoredRecord {
  recordType: RecordType;
  id: string;
  fields: RecordFields;
}

export type ComparisonOperator = "==" | ">=" | "<=" | ">" | "<";

export interface FieldPredicate {
  field: string;
  op: ComparisonOperator;
  value: FieldValue;
}

export interface RecordQuery {
  recordType: RecordType;

  /** All predicates must hold; each must target an indexed field */
  where: FieldPredicate[];

  sort?: { field: string; direction: "asc" | "desc" };
  limit?: number;

  /** Continuation cursor from a previous page */
  cursor?: string | null;
}

export interface QueryPage {
  records: StoredRecord[];

  /** Null once the result set is exhausted */
  cursor: string | null;
}

export type ChangeKind = "create" | "update" | "delete";

export interface SubscriptionSpec {
  /** Stable id used to detect an existing registration */
  id: string;
  recordType: RecordType;
  firesOn: ChangeKind[];

  /** Wake the receiver in the background without a visible alert */
  silent: boolean;
  alertBody?: string;
}

export interface ChangeNotification {
  subscriptionId: string;
  recordType: RecordType;

  /** Null when the transport could not say which record changed */
  recordId: string | null;
  kind: ChangeKind;
}

export type AvailabilityStatus = "available" | "unavailable";

export interface RecordStore {
  /** Probe whether the account/session behind the store is usable */
  checkAvailability(): Promise<AvailabilityStatus>;

  /** Insert a new record. Rejects with a conflict if the id exists. */
  create(record: StoredRecord): Promise<void>;

  /** Fetch one record. Rejects with not_found if absent. */
  fetch(recordType: RecordType, id: string): Promise<StoredRecord>;

  /**
   * Merge fields into an existing record and drop `removeFields` from it.
   * Rejects with not_found if absent.
   */
  update(
    recordType: RecordType,
    id: string,
    fields: RecordFields,
    removeFields?: string[]
  ): Promise<void>;

  /** Delete one record. Rejects with not_found if absent. */
  delete(recordType: RecordType, id: string): Promise<void>;

  query(query: RecordQuery): Promise<QueryPage>;

  listSubscriptions(): Promise<SubscriptionSpec[]>;

  /** Rejects with not_found while the record type has never been written */
  saveSubscription(spec: SubscriptionSpec): Promise<void>;

  deleteSubscription(id: string): Promise<void>;
}

export type NotificationHandler = (notification: ChangeNotification) => void;

export interface PushChannel {
  /** Deliver notifications for a registered subscription. Returns an unsubscribe. */
  listen(spec: SubscriptionSpec, handler: NotificationHandler): () => void;
}
