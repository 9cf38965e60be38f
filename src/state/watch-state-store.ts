// Durable watch/cursor state, one record per mailbox
import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db/index.js";
import { watchState } from "../db/schema.js";
import type { WatchStateRow } from "../db/schema.js";
import { StateUnavailableError, errorMessage } from "../lib/errors.js";
import { maxHistoryId } from "../shared/types/sync.js";
import type { WatchState } from "../shared/types/sync.js";

export interface WatchStateStore {
  load(): Promise<WatchState | null>;
  save(state: WatchState): Promise<void>;
  /** Persist `marker` as the cursor unless the stored cursor is already ahead */
  advanceCursor(marker: string): Promise<WatchState>;
  reset(): Promise<void>;
}

function parseLabelFilter(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((item): item is string => typeof item === "string");
}

function toWatchState(row: WatchStateRow): WatchState {
  return {
    mailbox: row.mailbox,
    historyCursor: row.historyCursor,
    watchExpiry: row.watchExpiry ? new Date(row.watchExpiry) : null,
    labelFilter: parseLabelFilter(row.labelFilter),
    updatedAt: new Date(row.updatedAt),
  };
}

/**
 * SQLite-backed store. Single-writer: callers serialize passes through the
 * sync service lock, so a plain upsert (last write wins) is enough.
 */
export class SqliteWatchStateStore implements WatchStateStore {
  constructor(
    private readonly db: AppDatabase,
    private readonly mailbox: string
  ) {}

  async load(): Promise<WatchState | null> {
    return this.guard("load", () => {
      const rows = this.db.select().from(watchState).where(eq(watchState.mailbox, this.mailbox)).limit(1).all();
      // A row that does not decode is as unusable as an unreachable store
      return rows.length > 0 ? toWatchState(rows[0]) : null;
    });
  }

  async save(state: WatchState): Promise<void> {
    const values = {
      historyCursor: state.historyCursor,
      watchExpiry: state.watchExpiry ? state.watchExpiry.toISOString() : null,
      labelFilter: JSON.stringify(state.labelFilter),
      updatedAt: new Date().toISOString(),
    };

    this.guard("save", () =>
      this.db
        .insert(watchState)
        .values({ mailbox: this.mailbox, ...values })
        .onConflictDoUpdate({ target: watchState.mailbox, set: values })
        .run()
    );
  }

  async advanceCursor(marker: string): Promise<WatchState> {
    const current = await this.load();
    const next: WatchState = current
      ? { ...current, historyCursor: maxHistoryId(current.historyCursor, marker) }
      : { mailbox: this.mailbox, historyCursor: marker, watchExpiry: null, labelFilter: [] };

    if (current && current.historyCursor === next.historyCursor) {
      return current;
    }

    await this.save(next);
    return next;
  }

  async reset(): Promise<void> {
    this.guard("reset", () => this.db.delete(watchState).where(eq(watchState.mailbox, this.mailbox)).run());
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StateUnavailableError(`watch state ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
