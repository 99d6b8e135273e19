import { integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

// ---------- Tables ----------

export const notificationHistory = sqliteTable(
  "notification_history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    feedIdentity: text("feed_identity").notNull(),
    entryIdentity: text("entry_identity").notNull(),
    notifiedAt: integer("notified_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    feedEntryIdx: uniqueIndex("notification_history_feed_entry_idx").on(
      table.feedIdentity,
      table.entryIdentity,
    ),
  }),
);

export type HistoryRow = typeof notificationHistory.$inferSelect;
