// Local index of messages whose upload and label both completed
import { desc, eq } from "drizzle-orm";
import type { AppDatabase } from "../db/index.js";
import { processedMessages } from "../db/schema.js";
import { StateUnavailableError, errorMessage } from "../lib/errors.js";
import type { ProcessedRecord } from "../shared/types/sync.js";

export interface ProcessedMessageStore {
  has(messageId: string): Promise<boolean>;
  record(entry: Omit<ProcessedRecord, "processedAt">): Promise<void>;
  list(limit?: number): Promise<ProcessedRecord[]>;
}

export class SqliteProcessedMessageStore implements ProcessedMessageStore {
  constructor(private readonly db: AppDatabase) {}

  async has(messageId: string): Promise<boolean> {
    try {
      const rows = this.db
        .select({ messageId: processedMessages.messageId })
        .from(processedMessages)
        .where(eq(processedMessages.messageId, messageId))
        .limit(1)
        .all();
      return rows.length > 0;
    } catch (error) {
      throw new StateUnavailableError(`processed index lookup failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async record(entry: Omit<ProcessedRecord, "processedAt">): Promise<void> {
    try {
      this.db
        .insert(processedMessages)
        .values({
          messageId: entry.messageId,
          mailbox: entry.mailbox,
          destinationFolderId: entry.destinationFolderId,
          folderName: entry.folderName,
          processedAt: new Date().toISOString(),
        })
        .onConflictDoNothing()
        .run();
    } catch (error) {
      throw new StateUnavailableError(`processed index write failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async list(limit = 100): Promise<ProcessedRecord[]> {
    const rows = this.db
      .select()
      .from(processedMessages)
      .orderBy(desc(processedMessages.processedAt))
      .limit(limit)
      .all();

    return rows.map((row) => ({
      messageId: row.messageId,
      mailbox: row.mailbox,
      destinationFolderId: row.destinationFolderId,
      folderName: row.folderName,
      processedAt: new Date(row.processedAt),
    }));
  }
}
