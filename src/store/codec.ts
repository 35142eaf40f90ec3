/**
 * Record <-> store field mapping
 *
 * Decoders validate with zod and return null for records that do not have
 * the expected shape, so one malformed record never fails a whole batch.
 */

import { z } from "zod";
import type { PromptRecord, RecordFields, SessionRecord, StoredRecord } from "../types";
import { SESSION_STATUSES } from "../types";
import { parseSessionId } from "../utils/session-id";

const sessionFieldsSchema = z.object({
  sessionId: z.string(),
  status: z.enum(SESSION_STATUSES),
  project: z.string(),
  timestamp: z.date(),
  pid: z.number().int().optional(),
  sourceDeviceName: z.string(),
});

const promptFieldsSchema = z.object({
  promptId: z.string().min(1),
  sessionId: z.string(),
  project: z.string(),
  promptMessage: z.string(),
  notificationType: z.string(),
  transcriptPath: z.string().optional(),
  transcriptExcerpt: z.string().optional(),
  timestamp: z.date(),
  pid: z.number().int().optional(),
  responded: z.boolean(),
  responseText: z.string().optional(),
  respondedAt: z.date().optional(),
  respondedFromDevice: z.string().optional(),
});

export function encodeSessionRecord(record: SessionRecord): RecordFields {
  const fields: RecordFields = {
    sessionId: record.id,
    status: record.status,
    project: record.project,
    timestamp: record.timestamp,
    sourceDeviceName: record.sourceDeviceName,
  };
  if (record.pid !== undefined) {
    fields["pid"] = record.pid;
  }
  return fields;
}

export function decodeSessionRecord(record: StoredRecord): SessionRecord | null {
  const parsed = sessionFieldsSchema.safeParse(record.fields);
  if (!parsed.success) return null;

  const id = parseSessionId(parsed.data.sessionId);
  if (!id) return null;

  return {
    id,
    status: parsed.data.status,
    project: parsed.data.project,
    timestamp: parsed.data.timestamp,
    pid: parsed.data.pid,
    sourceDeviceName: parsed.data.sourceDeviceName,
  };
}

export function encodePromptRecord(prompt: PromptRecord): RecordFields {
  const fields: RecordFields = {
    promptId: prompt.id,
    sessionId: prompt.sessionId,
    project: prompt.project,
    promptMessage: prompt.promptMessage,
    notificationType: prompt.notificationType,
    timestamp: prompt.timestamp,
    responded: prompt.responded,
  };

  const optional: Array<[string, string | number | Date | undefined]> = [
    ["transcriptPath", prompt.transcriptPath],
    ["transcriptExcerpt", prompt.transcriptExcerpt],
    ["pid", prompt.pid],
    ["responseText", prompt.responseText],
    ["respondedAt", prompt.respondedAt],
    ["respondedFromDevice", prompt.respondedFromDevice],
  ];
  for (const [key, value] of optional) {
    if (value !== undefined) fields[key] = value;
  }

  return fields;
}

export function decodePromptRecord(record: StoredRecord): PromptRecord | null {
  const parsed = promptFieldsSchema.safeParse(record.fields);
  if (!parsed.success) return null;

  const sessionId = parseSessionId(parsed.data.sessionId);
  if (!sessionId) return null;

  const { promptId, ...rest } = parsed.data;
  return { ...rest, id: promptId, sessionId };
}

/**
 * The only fields a remote device writes onto a prompt
 */
export function encodeResponseFields(text: string, deviceName: string, at: Date): RecordFields {
  return {
    responseText: text,
    respondedAt: at,
    respondedFromDevice: deviceName,
    responded: true,
  };
}
