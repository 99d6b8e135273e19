export { fetchFeed, createRssParser, entryIdentity, toChronological } from "./fetcher";
export { extractContent, buildPayload, truncateAtWord } from "./extractor";
export { filterUnseen, feedIdentity } from "./dedup";
export { floodDelayMs, createFloodGate, systemClock } from "./flood";
export {
  buildNotificationRequest,
  createNtfySender,
  createDispatcher,
} from "./dispatcher";
export { runSyncCycle } from "./sync";
export { FetchError, ExtractionError, DispatchError, StoreError } from "./errors";
export type {
  Priority,
  FeedSource,
  FeedGroup,
  Entry,
  NotificationPayload,
  DedupResult,
  SourceReport,
  GroupReport,
  SyncReport,
  SyncStatus,
} from "./types";
export type { FetchResult, FetchOptions, FeedParser, RawFeedItem } from "./fetcher";
export type { ExtractionResult } from "./extractor";
export type { Clock, FloodGate, FloodOptions } from "./flood";
export type { DispatchResult, SendNotificationFn, Dispatcher } from "./dispatcher";
export type { SyncDeps, SyncOptions } from "./sync";
