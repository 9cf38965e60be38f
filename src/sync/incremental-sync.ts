// Gmail History API sync engine for incremental processing
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import type { MessageProcessor } from "../pipeline/processor.js";
import type { WatchStateStore } from "../state/watch-state-store.js";
import type { Mailbox } from "../shared/types/capabilities.js";
import { emptySummary, isHistoryId, maxHistoryId, tally } from "../shared/types/sync.js";
import type { CandidateMessage, SyncSummary } from "../shared/types/sync.js";

export interface DeltaResult {
  newCursor: string;
  candidates: CandidateMessage[];
  pages: number;
}

export interface IncrementalSyncOptions {
  mailbox: Mailbox;
  store: WatchStateStore;
  processor: MessageProcessor;
  /** Label ids a new message must carry; empty accepts every message */
  labelFilter: string[];
  logger?: Logger;
}

export class IncrementalSyncEngine {
  private logger: Logger;

  constructor(private readonly options: IncrementalSyncOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  private matchesFilter(labels: string[]): boolean {
    const { labelFilter } = this.options;
    return labelFilter.length === 0 || labels.some((label) => labelFilter.includes(label));
  }

  /**
   * Collect every messageAdded change since `cursor`, following page tokens
   * until exhausted. Throws HistoryExpiredError when the cursor is too old.
   */
  async syncFrom(cursor: string): Promise<DeltaResult> {
    const seen = new Set<string>();
    const candidates: CandidateMessage[] = [];
    let newCursor = cursor;
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const page = await this.options.mailbox.fetchHistory(cursor, pageToken);
      pages++;

      if (isHistoryId(page.historyId)) {
        newCursor = maxHistoryId(newCursor, page.historyId) ?? newCursor;
      }

      for (const entry of page.entries) {
        if (isHistoryId(entry.id)) {
          newCursor = maxHistoryId(newCursor, entry.id) ?? newCursor;
        }

        for (const added of entry.messagesAdded) {
          // A message can show up in several history records
          if (seen.has(added.messageId) || !this.matchesFilter(added.labels)) continue;
          seen.add(added.messageId);
          candidates.push({
            messageId: added.messageId,
            threadId: added.threadId,
            labels: added.labels,
          });
        }
      }

      pageToken = page.nextPageToken;
    } while (pageToken);

    return { newCursor, candidates, pages };
  }

  /**
   * Fetch the delta, process every candidate in mailbox order, then persist
   * the advanced cursor. A crash before the final write re-fetches the same
   * range on the next pass; the processed label absorbs the repeats.
   *
   * When any candidate hit a transient failure the cursor stays where it was,
   * so the next notification replays the range and retries that message.
   */
  async run(cursor: string): Promise<SyncSummary> {
    const summary = emptySummary("history_incremental", cursor);
    const delta = await this.syncFrom(cursor);

    for (const candidate of delta.candidates) {
      tally(summary, await this.options.processor.process(candidate));
    }

    if (summary.retryable) {
      this.logger.warn(
        { cursor, newCursor: delta.newCursor, failed: summary.failed },
        "Transient failures during incremental sync, cursor held back"
      );
      return summary;
    }

    const state = await this.options.store.advanceCursor(delta.newCursor);
    summary.cursorAfter = state.historyCursor;

    this.logger.info(
      { ...summary, pages: delta.pages, candidates: delta.candidates.length },
      "Incremental sync complete"
    );
    return summary;
  }
}
