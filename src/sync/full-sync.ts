// Cursor-independent backstop: search for unprocessed mail and process it
import { AuthRejectedError, StateUnavailableError, errorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import type { MessageProcessor } from "../pipeline/processor.js";
import type { Mailbox, SearchPage } from "../shared/types/capabilities.js";
import { emptySummary, tally } from "../shared/types/sync.js";
import type { SyncSummary } from "../shared/types/sync.js";

export interface FullSyncOptions {
  mailbox: Mailbox;
  processor: MessageProcessor;
  /** Base search query, e.g. "has:attachment filename:zip in:inbox" */
  query: string;
  processedLabelName: string;
  maxMessagesPerCycle: number;
  logger?: Logger;
}

/**
 * Label operand for a Gmail search. Names with spaces or search syntax
 * characters must be quoted; Gmail has no escape for a double quote.
 */
export function labelOperand(name: string): string {
  return /^[\w./-]+$/.test(name) ? name : `"${name.replace(/"/g, "")}"`;
}

/**
 * Gmail search expression for eligible mail that is not yet labeled processed
 */
export function buildUnprocessedQuery(query: string, processedLabelName: string): string {
  return `(${query}) -label:${labelOperand(processedLabelName)}`;
}

export class FullSyncPoller {
  private logger: Logger;

  constructor(private readonly options: FullSyncOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get query(): string {
    return buildUnprocessedQuery(this.options.query, this.options.processedLabelName);
  }

  /**
   * Process up to `maxCycles` search pages. Each cycle's labels are applied
   * before the next page is fetched, so stopping early leaves nothing half done.
   * A search page that cannot be fetched ends the pass with what was done so
   * far, flagged `retryable`.
   */
  async fullSync(maxCycles: number): Promise<SyncSummary> {
    if (!Number.isInteger(maxCycles) || maxCycles < 1) {
      throw new RangeError(`maxCycles must be a positive integer, got ${maxCycles}`);
    }

    const summary = emptySummary("full_sync", null);
    const seen = new Set<string>();
    let pageToken: string | undefined;
    let cycles = 0;

    while (cycles < maxCycles) {
      let page: SearchPage;
      try {
        page = await this.options.mailbox.search(this.query, this.options.maxMessagesPerCycle, pageToken);
      } catch (error) {
        if (error instanceof StateUnavailableError || error instanceof AuthRejectedError) throw error;
        this.logger.warn({ cycle: cycles + 1, err: errorMessage(error) }, "Full sync search failed, stopping early");
        summary.retryable = true;
        summary.error = errorMessage(error);
        break;
      }
      cycles++;

      const fresh = page.messages.filter((message) => !seen.has(message.messageId));
      for (const message of fresh) {
        seen.add(message.messageId);
        const outcome = await this.options.processor.process({
          messageId: message.messageId,
          threadId: message.threadId,
          labels: [],
        });
        tally(summary, outcome);
      }

      if (page.messages.length === 0 || !page.nextPageToken) {
        break;
      }
      pageToken = page.nextPageToken;
    }

    summary.cycles = cycles;
    this.logger.info({ ...summary, query: this.query }, "Full sync complete");
    return summary;
  }
}
