import type { HistoryStore } from "./types";

export function createMemoryHistoryStore(): HistoryStore {
  const byFeed = new Map<string, Map<string, Date>>();

  return {
    contains: (feedIdentity, entryIdentity) =>
      byFeed.get(feedIdentity)?.has(entryIdentity) ?? false,

    record: (feedIdentity, entryIdentity, notifiedAt) => {
      let entries = byFeed.get(feedIdentity);
      if (!entries) {
        entries = new Map();
        byFeed.set(feedIdentity, entries);
      }
      if (!entries.has(entryIdentity)) {
        entries.set(entryIdentity, notifiedAt);
      }
    },

    count: (feedIdentity) => {
      if (feedIdentity !== undefined) {
        return byFeed.get(feedIdentity)?.size ?? 0;
      }
      let total = 0;
      for (const entries of byFeed.values()) total += entries.size;
      return total;
    },
  };
}
