// Shared domain types for the sync pipeline

export interface WatchState {
  mailbox: string;
  historyCursor: string | null;
  watchExpiry: Date | null;
  labelFilter: string[];
  updatedAt?: Date;
}

export interface Notification {
  mailboxAddress: string;
  historyMarker: string;
}

export interface CandidateMessage {
  messageId: string;
  threadId: string;
  labels: string[];
  /**
   * Whether the message carries an attachment, when the caller knows before
   * fetching it. History records do not say; `false` skips the fetch.
   */
  hasAttachment?: boolean;
}

export type OutcomeStatus = 'processed' | 'skipped' | 'failed';

export interface Outcome {
  messageId: string;
  status: OutcomeStatus;
  /** Destination folders written for this message (processed only) */
  folders?: UploadedFolder[];
  reason?: string;
  /** The failure was transient IO; the message should be tried again soon */
  retryable?: boolean;
}

export interface UploadedFolder {
  folderId: string;
  folderName: string;
}

export interface ProcessedRecord {
  messageId: string;
  mailbox: string;
  destinationFolderId: string;
  folderName: string;
  processedAt: Date;
}

export type SyncMode =
  | 'history_incremental'
  | 'history_gap_full_sync'
  | 'bootstrap_sync'
  | 'full_sync'
  | 'duplicate';

export interface SyncSummary {
  mode: SyncMode;
  cursorBefore: string | null;
  cursorAfter: string | null;
  checked: number;
  processed: number;
  skipped: number;
  failed: number;
  cycles?: number;
  /** Set when a transient failure left work undone; the next pass retries it */
  retryable?: boolean;
  error?: string;
}

export function emptySummary(mode: SyncMode, cursor: string | null): SyncSummary {
  return {
    mode,
    cursorBefore: cursor,
    cursorAfter: cursor,
    checked: 0,
    processed: 0,
    skipped: 0,
    failed: 0,
  };
}

export function tally(summary: SyncSummary, outcome: Outcome): void {
  summary.checked++;
  if (outcome.status === 'processed') summary.processed++;
  else if (outcome.status === 'skipped') summary.skipped++;
  else summary.failed++;
  if (outcome.retryable) summary.retryable = true;
}

/**
 * Compare two history markers. Gmail history ids are unsigned 64-bit
 * integers serialized as decimal strings, so they are compared as BigInt.
 */
export function compareHistoryIds(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function isHistoryId(value: string): boolean {
  return /^\d+$/.test(value);
}

export function maxHistoryId(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return compareHistoryIds(a, b) >= 0 ? a : b;
}
