// pattern: Imperative Shell
import { and, count, eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { notificationHistory } from "../db/schema";
import { StoreError, errorMessage } from "../pipeline/errors";
import type { HistoryStore } from "./types";

function guard<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    throw new StoreError(`history ${operation} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export function createSqliteHistoryStore(db: AppDatabase): HistoryStore {
  return {
    contains: (feedIdentity, entryIdentity) =>
      guard("lookup", () => {
        const row = db
          .select({ id: notificationHistory.id })
          .from(notificationHistory)
          .where(
            and(
              eq(notificationHistory.feedIdentity, feedIdentity),
              eq(notificationHistory.entryIdentity, entryIdentity),
            ),
          )
          .get();
        return row !== undefined;
      }),

    record: (feedIdentity, entryIdentity, notifiedAt) =>
      guard("write", () => {
        db.insert(notificationHistory)
          .values({ feedIdentity, entryIdentity, notifiedAt })
          .onConflictDoNothing()
          .run();
      }),

    count: (feedIdentity) =>
      guard("count", () => {
        const row = db
          .select({ total: count() })
          .from(notificationHistory)
          .where(
            feedIdentity === undefined
              ? undefined
              : eq(notificationHistory.feedIdentity, feedIdentity),
          )
          .get();
        return row?.total ?? 0;
      }),
  };
}
