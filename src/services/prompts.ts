/**
 * PromptChannel - prompt/response records in the remote store
 *
 * Lifecycle of one prompt: the source creates it with responded=false, a
 * remote device writes the response fields onto the same record, and the
 * source deletes it once the text has been delivered locally.
 */

import type { Logger } from "pino";
import { decodePromptRecord, encodePromptRecord, encodeResponseFields } from "../store/codec";
import { queryAll } from "../store/paging";
import type {
  PromptRecord,
  PublishOutcome,
  RecordQuery,
  RecordStore,
  SessionId,
  StoredRecord,
} from "../types";
import { isStoreError } from "../utils/errors";
import { errorMessage } from "../utils/logger";

const DEFAULT_PAGE_SIZE = 100;

export class PromptChannel {
  private store: RecordStore;
  private log: Logger;
  private pageSize: number;

  constructor(store: RecordStore, logger: Logger, pageSize = DEFAULT_PAGE_SIZE) {
    this.store = store;
    this.log = logger;
    this.pageSize = pageSize;
  }

  /**
   * Create the record for one prompt occurrence. Never overwrites.
   */
  async publishPrompt(prompt: PromptRecord): Promise<PublishOutcome> {
    try {
      await this.store.create({
        recordType: "Prompt",
        id: prompt.id,
        fields: encodePromptRecord(prompt),
      });
      this.log.info({ promptId: prompt.id, sessionId: prompt.sessionId }, "Prompt published");
      return "created";
    } catch (error) {
      if (isStoreError(error, "conflict")) {
        this.log.debug({ promptId: prompt.id }, "Prompt already published");
        return "exists";
      }
      this.log.warn({ promptId: prompt.id, error: errorMessage(error) }, "Prompt publish failed");
      return "skipped";
    }
  }

  /**
   * Answer a prompt from a remote device.
   * Only the response fields are written; the source's fields stay untouched.
   */
  async submitResponse(promptId: string, text: string, deviceName: string): Promise<boolean> {
    const responseText = text.trim();
    if (!responseText) {
      this.log.warn({ promptId }, "Refusing empty response");
      return false;
    }

    try {
      const prompt = decodePromptRecord(await this.store.fetch("Prompt", promptId));
      if (!prompt) {
        this.log.warn({ promptId }, "Prompt record is malformed");
        return false;
      }
      if (prompt.responded) {
        this.log.info(
          { promptId, respondedFromDevice: prompt.respondedFromDevice },
          "Prompt already answered"
        );
        return false;
      }

      await this.store.update(
        "Prompt",
        promptId,
        encodeResponseFields(responseText, deviceName, new Date())
      );
      this.log.info({ promptId, deviceName }, "Response submitted");
      return true;
    } catch (error) {
      // Only the source creates prompts, so a missing one is an error here
      this.log.error({ promptId, error: errorMessage(error) }, "Failed to submit response");
      return false;
    }
  }

  /**
   * Unanswered prompts, newest first
   */
  async fetchPendingPrompts(): Promise<PromptRecord[]> {
    return this.fetchMany({
      recordType: "Prompt",
      where: [{ field: "responded", op: "==", value: false }],
      sort: { field: "timestamp", direction: "desc" },
      limit: this.pageSize,
    });
  }

  /**
   * Answered prompts for one session, most recently answered first
   */
  async fetchResponses(sessionId: SessionId): Promise<PromptRecord[]> {
    return this.fetchMany({
      recordType: "Prompt",
      where: [
        { field: "sessionId", op: "==", value: sessionId },
        { field: "responded", op: "==", value: true },
      ],
      sort: { field: "respondedAt", direction: "desc" },
      limit: this.pageSize,
    });
  }

  async fetchPrompt(id: string): Promise<PromptRecord | null> {
    try {
      return decodePromptRecord(await this.store.fetch("Prompt", id));
    } catch (error) {
      if (!isStoreError(error, "not_found")) {
        this.log.warn({ promptId: id, error: errorMessage(error) }, "Prompt fetch failed");
      }
      return null;
    }
  }

  /**
   * Delete a delivered prompt. A record that is already gone counts as deleted.
   */
  async deletePrompt(id: string): Promise<boolean> {
    try {
      await this.store.delete("Prompt", id);
      this.log.debug({ promptId: id }, "Prompt deleted");
      return true;
    } catch (error) {
      if (isStoreError(error, "not_found")) return true;
      this.log.warn({ promptId: id, error: errorMessage(error) }, "Prompt delete failed");
      return false;
    }
  }

  /**
   * Run a prompt query; a record type that was never written yields []
   */
  private async fetchMany(query: RecordQuery): Promise<PromptRecord[]> {
    let stored: StoredRecord[];
    try {
      stored = await queryAll(this.store, query);
    } catch (error) {
      if (isStoreError(error, "not_found")) {
        this.log.debug("No prompts published yet");
        return [];
      }
      throw error;
    }

    const prompts: PromptRecord[] = [];
    for (const record of stored) {
      const prompt = decodePromptRecord(record);
      if (prompt) {
        prompts.push(prompt);
      } else {
        this.log.warn({ recordId: record.id }, "Skipping malformed prompt record");
      }
    }
    return prompts;
  }
}
