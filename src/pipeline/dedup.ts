import type { HistoryStore } from "../history";
import type { DedupResult, Entry } from "./types";

/** Identity under which a source's entries are recorded: topic plus feed URL. */
export function feedIdentity(topic: string, url: string): string {
  return `${topic}|${url}`;
}

/**
 * Drops entries already recorded for `feedIdentity`, keeping input order.
 * Only reads the store; recording happens after a successful dispatch, so a
 * failed send leaves the entry eligible for the next cycle.
 *
 * @throws StoreError when the store cannot be read.
 */
export function filterUnseen(
  store: HistoryStore,
  feedIdentity: string,
  entries: ReadonlyArray<Entry>,
): DedupResult {
  const unseen: Array<Entry> = [];
  const batch = new Set<string>();
  let skippedCount = 0;

  for (const entry of entries) {
    if (batch.has(entry.identity) || store.contains(feedIdentity, entry.identity)) {
      skippedCount++;
      continue;
    }
    batch.add(entry.identity);
    unseen.push(entry);
  }

  return { unseen, skippedCount };
}
