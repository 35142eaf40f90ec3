/**
 * FirestoreRecordStore - RecordStore and PushChannel on Cloud Firestore
 *
 * Each record type lives in its own collection, keyed by record id.
 * Subscriptions are kept in a registry collection so registration stays
 * idempotent across restarts; push delivery uses snapshot listeners.
 */

import type { CollectionReference, DocumentData, Firestore, Query } from "firebase-admin/firestore";
import { FieldValue as FirestoreFieldValue, Timestamp } from "firebase-admin/firestore";
import type { Logger } from "pino";
import { z } from "zod";
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
import { errorMessage } from "../utils/logger";

const COLLECTIONS: Record<RecordType, string> = {
  Session: "sessions",
  Prompt: "prompts",
};

const SUBSCRIPTIONS_COLLECTION = "subscriptions";

// gRPC status codes carried by Firestore errors
const GRPC_INVALID_ARGUMENT = 3;
const GRPC_NOT_FOUND = 5;
const GRPC_ALREADY_EXISTS = 6;
const GRPC_PERMISSION_DENIED = 7;
const GRPC_FAILED_PRECONDITION = 9;

const subscriptionSchema = z.object({
  recordType: z.enum(["Session", "Prompt"]),
  firesOn: z.array(z.enum(["create", "update", "delete"])),
  silent: z.boolean(),
  alertBody: z.string().optional(),
});

function grpcCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "number" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Map a Firestore failure onto the store error taxonomy.
 * Anything not recognised is treated as unavailable for this cycle.
 */
export function toStoreError(error: unknown, context: string): StoreError {
  if (error instanceof StoreError) return error;

  const message = `${context}: ${errorMessage(error)}`;
  switch (grpcCode(error)) {
    case GRPC_NOT_FOUND:
      return new StoreError("not_found", message, { cause: error });
    case GRPC_ALREADY_EXISTS:
      return new StoreError("conflict", message, { cause: error });
    case GRPC_PERMISSION_DENIED:
    case GRPC_FAILED_PRECONDITION:
      return new StoreError("permission", message, { cause: error });
    case GRPC_INVALID_ARGUMENT:
      return new StoreError("invalid", message, { cause: error });
    default:
      return new StoreError("unavailable", message, { cause: error });
  }
}

function encodeValue(value: FieldValue): string | number | boolean | Timestamp {
  return value instanceof Date ? Timestamp.fromDate(value) : value;
}

function encodeFields(fields: RecordFields): DocumentData {
  const data: DocumentData = {};
  for (const [key, value] of Object.entries(fields)) {
    data[key] = encodeValue(value);
  }
  return data;
}

/**
 * Keep only values the sync core understands; anything else is dropped and
 * left for the record decoder to reject.
 */
function decodeFields(data: DocumentData): RecordFields {
  const fields: RecordFields = {};
  for (const key of Object.keys(data)) {
    const value: unknown = data[key];
    if (value instanceof Timestamp) {
      fields[key] = value.toDate();
    } else if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      fields[key] = value;
    }
  }
  return fields;
}

function changeKind(type: "added" | "modified" | "removed"): ChangeKind {
  if (type === "added") return "create";
  if (type === "removed") return "delete";
  return "update";
}

export class FirestoreRecordStore implements RecordStore, PushChannel {
  private db: Firestore;
  private prefix: string;
  private log: Logger;

  constructor(db: Firestore, prefix: string, logger: Logger) {
    this.db = db;
    this.prefix = prefix;
    this.log = logger;
  }

  async checkAvailability(): Promise<AvailabilityStatus> {
    try {
      await this.collection("Session").limit(1).get();
      return "available";
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Firestore not reachable");
      return "unavailable";
    }
  }

  async create(record: StoredRecord): Promise<void> {
    try {
      await this.collection(record.recordType).doc(record.id).create(encodeFields(record.fields));
    } catch (error) {
      throw toStoreError(error, `create ${record.recordType} ${record.id}`);
    }
  }

  async fetch(recordType: RecordType, id: string): Promise<StoredRecord> {
    let data: DocumentData | undefined;
    try {
      data = (await this.collection(recordType).doc(id).get()).data();
    } catch (error) {
      throw toStoreError(error, `fetch ${recordType} ${id}`);
    }
    if (!data) {
      throw new StoreError("not_found", `${recordType} ${id} not found`);
    }
    return { recordType, id, fields: decodeFields(data) };
  }

  async update(
    recordType: RecordType,
    id: string,
    fields: RecordFields,
    removeFields: string[] = []
  ): Promise<void> {
    const data: DocumentData = encodeFields(fields);
    for (const field of removeFields) {
      data[field] = FirestoreFieldValue.delete();
    }

    try {
      await this.collection(recordType).doc(id).update(data);
    } catch (error) {
      throw toStoreError(error, `update ${recordType} ${id}`);
    }
  }

  async delete(recordType: RecordType, id: string): Promise<void> {
    try {
      await this.collection(recordType).doc(id).delete({ exists: true });
    } catch (error) {
      throw toStoreError(error, `delete ${recordType} ${id}`);
    }
  }

  async query(query: RecordQuery): Promise<QueryPage> {
    const collection = this.collection(query.recordType);

    try {
      let q: Query = collection;
      for (const predicate of query.where) {
        q = q.where(predicate.field, predicate.op, encodeValue(predicate.value));
      }
      if (query.sort) {
        q = q.orderBy(query.sort.field, query.sort.direction);
      }
      if (query.cursor) {
        const cursorSnap = await collection.doc(query.cursor).get();
        // The cursor document was deleted since the previous page
        if (!cursorSnap.exists) {
          return { records: [], cursor: null };
        }
        q = q.startAfter(cursorSnap);
      }
      if (query.limit) {
        q = q.limit(query.limit);
      }

      const snapshot = await q.get();
      const records = snapshot.docs.map(
        (doc): StoredRecord => ({
          recordType: query.recordType,
          id: doc.id,
          fields: decodeFields(doc.data()),
        })
      );
      const last = snapshot.docs[snapshot.docs.length - 1];

      return {
        records,
        cursor: query.limit && last && snapshot.size === query.limit ? last.id : null,
      };
    } catch (error) {
      throw toStoreError(error, `query ${query.recordType}`);
    }
  }

  async listSubscriptions(): Promise<SubscriptionSpec[]> {
    try {
      const snapshot = await this.db.collection(this.name(SUBSCRIPTIONS_COLLECTION)).get();
      const specs: SubscriptionSpec[] = [];
      for (const doc of snapshot.docs) {
        const parsed = subscriptionSchema.safeParse(doc.data());
        if (parsed.success) {
          specs.push({ id: doc.id, ...parsed.data });
        } else {
          this.log.warn({ subscriptionId: doc.id }, "Skipping malformed subscription");
        }
      }
      return specs;
    } catch (error) {
      throw toStoreError(error, "list subscriptions");
    }
  }

  async saveSubscription(spec: SubscriptionSpec): Promise<void> {
    const data: DocumentData = {
      recordType: spec.recordType,
      firesOn: spec.firesOn,
      silent: spec.silent,
    };
    if (spec.alertBody !== undefined) {
      data["alertBody"] = spec.alertBody;
    }

    try {
      await this.db.collection(this.name(SUBSCRIPTIONS_COLLECTION)).doc(spec.id).set(data);
    } catch (error) {
      throw toStoreError(error, `save subscription ${spec.id}`);
    }
  }

  async deleteSubscription(id: string): Promise<void> {
    try {
      await this.db
        .collection(this.name(SUBSCRIPTIONS_COLLECTION))
        .doc(id)
        .delete({ exists: true });
    } catch (error) {
      throw toStoreError(error, `delete subscription ${id}`);
    }
  }

  listen(spec: SubscriptionSpec, handler: NotificationHandler): () => void {
    // The first snapshot lists every existing document, not changes
    let initial = true;

    return this.collection(spec.recordType).onSnapshot(
      (snapshot) => {
        if (initial) {
          initial = false;
          return;
        }
        for (const change of snapshot.docChanges()) {
          const kind = changeKind(change.type);
          if (!spec.firesOn.includes(kind)) continue;
          handler({
            subscriptionId: spec.id,
            recordType: spec.recordType,
            recordId: change.doc.id,
            kind,
          });
        }
      },
      (error) => {
        this.log.warn({ subscriptionId: spec.id, error: errorMessage(error) }, "Push listener failed");
      }
    );
  }

  private name(collection: string): string {
    return `${this.prefix}${collection}`;
  }

  private collection(recordType: RecordType): CollectionReference {
    return this.db.collection(this.name(COLLECTIONS[recordType]));
  }
}
