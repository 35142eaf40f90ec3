/**
 * MessageQueue - Promise-chain-based FIFO queue
 *
 * Runs async operations one at a time in the order they were enqueued, so
 * replies typed in quick succession reach the store in that order.
 */

import type { Logger } from "pino";
import { errorMessage } from "./logger";

export class MessageQueue {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  /**
   * Add an operation to the queue. A failing operation is logged and the
   * queue moves on.
   */
  enqueue(fn: () => Promise<void>): void {
    this.pending++;

    this.chain = this.chain.then(async () => {
      try {
        await fn();
      } catch (error) {
        this.log.error({ error: errorMessage(error) }, "Queue task failed");
      } finally {
        this.pending--;
      }
    });
  }

  /**
   * Operations enqueued and not yet finished
   */
  size(): number {
    return this.pending;
  }

  /**
   * Resolves once everything enqueued so far has run
   */
  async drain(): Promise<void> {
    await this.chain;
  }
}
