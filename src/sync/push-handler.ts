// Handling of decoded Gmail push notifications
import { HistoryExpiredError, MalformedInputError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { silentLogger } from "../lib/logger.js";
import type { WatchStateStore } from "../state/watch-state-store.js";
import { compareHistoryIds, emptySummary, isHistoryId } from "../shared/types/sync.js";
import type { Notification, SyncSummary } from "../shared/types/sync.js";
import type { FullSyncPoller } from "./full-sync.js";
import type { IncrementalSyncEngine } from "./incremental-sync.js";

export interface PushHandlerOptions {
  store: WatchStateStore;
  incremental: IncrementalSyncEngine;
  fullSync: FullSyncPoller;
  mailboxAddress: string;
  maxCycles: number;
  logger?: Logger;
}

export interface PushResult extends SyncSummary {
  historyMarker: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode a Pub/Sub push envelope into a Gmail notification
 * (`message.data` is base64 JSON `{ emailAddress, historyId }`).
 */
export function decodeNotification(body: unknown): Notification {
  if (!isRecord(body) || !isRecord(body.message)) {
    throw new MalformedInputError("Invalid Pub/Sub payload: missing 'message'");
  }

  const data = body.message.data;
  if (typeof data !== "string" || data === "") {
    throw new MalformedInputError("Invalid Pub/Sub payload: missing 'message.data'");
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(data, "base64").toString("utf-8"));
  } catch (error) {
    throw new MalformedInputError("Invalid Pub/Sub payload: 'message.data' is not base64 JSON", { cause: error });
  }

  if (!isRecord(payload)) {
    throw new MalformedInputError("Invalid Gmail notification: payload is not an object");
  }

  const historyId = String(payload.historyId ?? "").trim();
  if (!isHistoryId(historyId)) {
    throw new MalformedInputError("Gmail notification without a valid historyId");
  }

  const emailAddress = typeof payload.emailAddress === "string" ? payload.emailAddress.trim() : "";
  return { mailboxAddress: emailAddress, historyMarker: historyId };
}

export class PushHandler {
  private logger: Logger;

  constructor(private readonly options: PushHandlerOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Apply one notification. A marker at or below the stored cursor is a
   * duplicate or out-of-order delivery and does nothing. The marker only
   * gates the pass: an incremental sync advances the cursor to the history id
   * the mailbox reports, which may be past the marker. The full-sync paths
   * advance it to the marker, unless a transient failure left work undone.
   */
  async handle(notification: Notification): Promise<PushResult> {
    const { store, incremental, fullSync, maxCycles } = this.options;
    const marker = notification.historyMarker;

    const state = await store.load();
    const cursor = state?.historyCursor ?? null;

    if (
      notification.mailboxAddress &&
      notification.mailboxAddress.toLowerCase() !== this.options.mailboxAddress.toLowerCase()
    ) {
      this.logger.warn({ mailbox: notification.mailboxAddress }, "Push notification for another mailbox ignored");
      return { ...emptySummary("duplicate", cursor), historyMarker: marker };
    }

    if (cursor === null) {
      // Nothing to diff against yet: catch up by search, then start from here
      const summary = await fullSync.fullSync(maxCycles);
      const cursorAfter = await this.advanceUnlessRetryable(summary, marker);
      return this.finish({ ...summary, mode: "bootstrap_sync", cursorBefore: null, cursorAfter }, marker);
    }

    if (compareHistoryIds(marker, cursor) <= 0) {
      this.logger.debug({ marker, cursor }, "Stale push notification ignored");
      return { ...emptySummary("duplicate", cursor), historyMarker: marker };
    }

    try {
      return this.finish(await incremental.run(cursor), marker);
    } catch (error) {
      if (!(error instanceof HistoryExpiredError)) throw error;

      this.logger.warn({ cursor, marker }, "History cursor expired, falling back to full sync");
      const summary = await fullSync.fullSync(maxCycles);
      const cursorAfter = (await this.advanceUnlessRetryable(summary, marker)) ?? cursor;
      return this.finish({ ...summary, mode: "history_gap_full_sync", cursorBefore: cursor, cursorAfter }, marker);
    }
  }

  private async advanceUnlessRetryable(summary: SyncSummary, marker: string): Promise<string | null> {
    if (summary.retryable) {
      this.logger.warn({ marker, error: summary.error }, "Full sync incomplete, cursor not advanced");
      return (await this.options.store.load())?.historyCursor ?? null;
    }
    return (await this.options.store.advanceCursor(marker)).historyCursor;
  }

  private finish(summary: SyncSummary, marker: string): PushResult {
    this.logger.info({ ...summary, historyMarker: marker }, "Push notification processed");
    return { ...summary, historyMarker: marker };
  }
}
