/**
 * InMemoryRecordStore - in-process record store and push channel
 *
 * Mirrors the behaviour the sync core relies on from a hosted store:
 * insert conflicts, not-found on unknown ids and on record types that were
 * never written, queries restricted to indexed fields, cursor pagination and
 * asynchronous change notifications for registered subscriptions.
 * Used by the `memory` backend and as the stand-in store in tests.
 */

import type {
  AvailabilityStatus,
  ChangeKind,
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
} from "../types";
import { StoreError } from "../utils/errors";

export interface InMemoryStoreOptions {
  /** Queryable fields per record type */
  indexes?: Partial<Record<RecordType, string[]>>;

  /** Allow predicate-less queries over a whole record type */
  allowUnrestrictedQueries?: boolean;
}

const DEFAULT_INDEXES: Record<RecordType, string[]> = {
  Session: ["sessionId", "status", "timestamp"],
  Prompt: ["sessionId", "responded", "timestamp", "respondedAt"],
};

function cloneFields(fields: RecordFields): RecordFields {
  const copy: RecordFields = {};
  for (const [key, value] of Object.entries(fields)) {
    copy[key] = value instanceof Date ? new Date(value.getTime()) : value;
  }
  return copy;
}

function compareValues(a: FieldValue, b: FieldValue): number | null {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  return null;
}

export class InMemoryRecordStore implements RecordStore, PushChannel {
  private tables = new Map<RecordType, Map<string, RecordFields>>();
  private subscriptions = new Map<string, SubscriptionSpec>();
  private handlers = new Map<string, Set<NotificationHandler>>();
  private indexes: Record<RecordType, string[]>;
  private allowUnrestrictedQueries: boolean;
  private available = true;

  constructor(options: InMemoryStoreOptions = {}) {
    this.indexes = { ...DEFAULT_INDEXES, ...options.indexes };
    this.allowUnrestrictedQueries = options.allowUnrestrictedQueries ?? false;
  }

  /**
   * Simulate the account becoming unreachable or coming back
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /**
   * Current contents of a record type, for inspection
   */
  records(recordType: RecordType): StoredRecord[] {
    const table = this.tables.get(recordType);
    if (!table) return [];
    return [...table].map(([id, fields]) => ({ recordType, id, fields: cloneFields(fields) }));
  }

  async checkAvailability(): Promise<AvailabilityStatus> {
    return this.available ? "available" : "unavailable";
  }

  async create(record: StoredRecord): Promise<void> {
    this.assertAvailable();
    const table = this.ensureTable(record.recordType);
    if (table.has(record.id)) {
      throw new StoreError("conflict", `${record.recordType} ${record.id} already exists`);
    }
    table.set(record.id, cloneFields(record.fields));
    this.notify(record.recordType, record.id, "create");
  }

  async fetch(recordType: RecordType, id: string): Promise<StoredRecord> {
    this.assertAvailable();
    const fields = this.tables.get(recordType)?.get(id);
    if (!fields) {
      throw new StoreError("not_found", `${recordType} ${id} not found`);
    }
    return { recordType, id, fields: cloneFields(fields) };
  }

  async update(
    recordType: RecordType,
    id: string,
    fields: RecordFields,
    removeFields: string[] = []
  ): Promise<void> {
    this.assertAvailable();
    const table = this.tables.get(recordType);
    const existing = table?.get(id);
    if (!table || !existing) {
      throw new StoreError("not_found", `${recordType} ${id} not found`);
    }
    const merged = { ...existing, ...cloneFields(fields) };
    for (const field of removeFields) {
      delete merged[field];
    }
    table.set(id, merged);
    this.notify(recordType, id, "update");
  }

  async delete(recordType: RecordType, id: string): Promise<void> {
    this.assertAvailable();
    const table = this.tables.get(recordType);
    if (!table?.delete(id)) {
      throw new StoreError("not_found", `${recordType} ${id} not found`);
    }
    this.notify(recordType, id, "delete");
  }

  async query(query: RecordQuery): Promise<QueryPage> {
    this.assertAvailable();
    const table = this.tables.get(query.recordType);
    if (!table) {
      throw new StoreError("not_found", `Record type ${query.recordType} does not exist`);
    }

    if (query.where.length === 0 && !this.allowUnrestrictedQueries) {
      throw new StoreError("permission", `Record type ${query.recordType} is not queryable`);
    }

    const indexed = this.indexes[query.recordType];
    const fields = [...query.where.map((p) => p.field), ...(query.sort ? [query.sort.field] : [])];
    for (const field of fields) {
      if (!indexed.includes(field)) {
        throw new StoreError("permission", `Field ${field} of ${query.recordType} is not indexed`);
      }
    }

    const matches = [...table]
      .filter(([, record]) =>
        query.where.every((predicate) => {
          const value = record[predicate.field];
          if (value === undefined) return false;
          const cmp = compareValues(value, predicate.value);
          if (cmp === null) return false;
          switch (predicate.op) {
            case "==":
              return cmp === 0;
            case ">=":
              return cmp >= 0;
            case "<=":
              return cmp <= 0;
            case ">":
              return cmp > 0;
            case "<":
              return cmp < 0;
          }
        })
      )
      .map(([id, record]): StoredRecord => ({
        recordType: query.recordType,
        id,
        fields: cloneFields(record),
      }));

    const sort = query.sort;
    if (sort) {
      const direction = sort.direction === "asc" ? 1 : -1;
      matches.sort((a, b) => {
        const av = a.fields[sort.field];
        const bv = b.fields[sort.field];
        if (av === undefined) return bv === undefined ? 0 : 1;
        if (bv === undefined) return -1;
        return (compareValues(av, bv) ?? 0) * direction;
      });
    }

    const offset = query.cursor ? Number.parseInt(query.cursor, 10) : 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new StoreError("invalid", `Invalid cursor ${query.cursor}`);
    }

    const limit = query.limit ?? matches.length;
    const end = offset + limit;
    return {
      records: matches.slice(offset, end),
      cursor: end < matches.length ? String(end) : null,
    };
  }

  async listSubscriptions(): Promise<SubscriptionSpec[]> {
    this.assertAvailable();
    return [...this.subscriptions.values()];
  }

  async saveSubscription(spec: SubscriptionSpec): Promise<void> {
    this.assertAvailable();
    if (!this.tables.has(spec.recordType)) {
      throw new StoreError("not_found", `Record type ${spec.recordType} does not exist`);
    }
    this.subscriptions.set(spec.id, { ...spec, firesOn: [...spec.firesOn] });
  }

  async deleteSubscription(id: string): Promise<void> {
    this.assertAvailable();
    if (!this.subscriptions.delete(id)) {
      throw new StoreError("not_found", `Subscription ${id} not found`);
    }
  }

  listen(spec: SubscriptionSpec, handler: NotificationHandler): () => void {
    const handlers = this.handlers.get(spec.id) ?? new Set<NotificationHandler>();
    handlers.add(handler);
    this.handlers.set(spec.id, handlers);
    return () => {
      handlers.delete(handler);
    };
  }

  private ensureTable(recordType: RecordType): Map<string, RecordFields> {
    let table = this.tables.get(recordType);
    if (!table) {
      table = new Map();
      this.tables.set(recordType, table);
    }
    return table;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new StoreError("unavailable", "Store account is not available");
    }
  }

  private notify(recordType: RecordType, recordId: string, kind: ChangeKind): void {
    for (const subscription of this.subscriptions.values()) {
      if (subscription.recordType !== recordType || !subscription.firesOn.includes(kind)) {
        continue;
      }
      for (const handler of this.handlers.get(subscription.id) ?? []) {
        queueMicrotask(() =>
          handler({ subscriptionId: subscription.id, recordType, recordId, kind })
        );
      }
    }
  }
}
