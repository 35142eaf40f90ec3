/**
 * Cursor pagination over RecordStore.query
 */

import type { RecordQuery, RecordStore, StoredRecord } from "../types";

/**
 * Run a query to exhaustion, following continuation cursors
 */
export async function queryAll(store: RecordStore, query: RecordQuery): Promise<StoredRecord[]> {
  const records: StoredRecord[] = [];
  let cursor: string | null = query.cursor ?? null;

  do {
    const page = await store.query({ ...query, cursor });
    records.push(...page.records);
    cursor = page.cursor;
  } while (cursor !== null);

  return records;
}
