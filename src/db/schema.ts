import { sqliteTable, text, index } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// Watch/cursor state, one row per mailbox
export const watchState = sqliteTable("watch_state", {
  mailbox: text("mailbox").primaryKey().notNull(),
  historyCursor: text("history_cursor"),
  watchExpiry: text("watch_expiry"),
  labelFilter: text("label_filter").notNull().default("[]"),
  updatedAt: text("updated_at")
    .notNull()
    .default(sql`(datetime('now'))`),
});

// Local record of completed messages (the Gmail label stays authoritative)
export const processedMessages = sqliteTable(
  "processed_messages",
  {
    messageId: text("message_id").primaryKey().notNull(),
    mailbox: text("mailbox").notNull(),
    destinationFolderId: text("destination_folder_id").notNull(),
    folderName: text("folder_name").notNull(),
    processedAt: text("processed_at")
      .notNull()
      .default(sql`(datetime('now'))`),
  },
  (table) => ({
    mailboxIdx: index("processed_messages_mailbox_idx").on(table.mailbox),
  })
);

export type WatchStateRow = typeof watchState.$inferSelect;
export type NewWatchStateRow = typeof watchState.$inferInsert;

export type ProcessedMessageRow = typeof processedMessages.$inferSelect;
export type NewProcessedMessageRow = typeof processedMessages.$inferInsert;
