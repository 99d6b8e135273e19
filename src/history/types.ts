/**
 * Ledger of entries that have already been notified, keyed per feed.
 * Implementations throw `StoreError` when the backing store fails.
 */
export type HistoryStore = {
  readonly contains: (feedIdentity: string, entryIdentity: string) => boolean;
  /** Recording a pair that is already present leaves the original row untouched. */
  readonly record: (
    feedIdentity: string,
    entryIdentity: string,
    notifiedAt: Date,
  ) => void;
  readonly count: (feedIdentity?: string) => number;
};
