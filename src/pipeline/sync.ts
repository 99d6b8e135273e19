// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { Settings } from "../config";
import type { HistoryStore } from "../history";
import { feedIdentity, filterUnseen } from "./dedup";
import { createDispatcher } from "./dispatcher";
import type { Dispatcher, SendNotificationFn } from "./dispatcher";
import { ExtractionError, StoreError, errorMessage } from "./errors";
import { buildPayload } from "./extractor";
import { fetchFeed } from "./fetcher";
import type { FetchOptions, FetchResult } from "./fetcher";
import { createFloodGate, systemClock } from "./flood";
import type { Clock } from "./flood";
import type {
  FeedGroup,
  FeedSource,
  GroupReport,
  NotificationPayload,
  SourceReport,
  SyncReport,
  SyncStatus,
} from "./types";

export type SyncOptions = Pick<
  Settings,
  | "userAgent"
  | "requestTimeoutMs"
  | "maxEntriesPerFeed"
  | "descriptionMaxLength"
  | "floodMinDelayMs"
  | "floodMaxDelayMs"
  | "fetchConcurrency"
  | "markdown"
  | "timeZone"
>;

export type FetchFeedFn = (
  source: FeedSource,
  options: FetchOptions,
  logger: Logger,
) => Promise<FetchResult>;

export type SyncDeps = {
  readonly store: HistoryStore;
  readonly send: SendNotificationFn;
  readonly options: SyncOptions;
  readonly logger: Logger;
  readonly fetchFeed?: FetchFeedFn;
  readonly clock?: Clock;
  /** Fires on shutdown; stops the cycle at its next flood-gate wait. */
  readonly signal?: AbortSignal;
};

type SourceTally = { -readonly [K in keyof SourceReport]: SourceReport[K] };

type SourceContext = {
  readonly topic: string;
  readonly store: HistoryStore;
  readonly dispatcher: Dispatcher;
  readonly options: SyncOptions;
  readonly clock: Clock;
  readonly logger: Logger;
};

function emptyTally(source: FeedSource): SourceTally {
  return {
    feedName: source.name,
    url: source.url,
    fetched: 0,
    unseen: 0,
    dispatched: 0,
    failed: 0,
    skipped: 0,
    deferred: 0,
    error: null,
  };
}

/**
 * Fills `tally` as it goes, so a caller that catches a throw still holds the
 * counts reached before it.
 */
async function processSource(
  source: FeedSource,
  result: FetchResult,
  ctx: SourceContext,
  tally: SourceTally,
): Promise<SourceReport> {
  if (!result.success) {
    tally.error = result.error.message;
    return tally;
  }

  tally.fetched = result.entries.length;

  const identity = feedIdentity(ctx.topic, source.url);
  const { unseen } = filterUnseen(ctx.store, identity, result.entries);
  const batch = unseen.slice(0, ctx.options.maxEntriesPerFeed);

  tally.unseen = unseen.length;
  tally.deferred = unseen.length - batch.length;

  for (const entry of batch) {
    let payload: NotificationPayload;
    try {
      payload = buildPayload(ctx.topic, source, entry, {
        maxDescriptionLength: ctx.options.descriptionMaxLength,
        markdown: ctx.options.markdown,
        timeZone: ctx.options.timeZone,
      });
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      tally.skipped++;
      ctx.logger.warn(
        { feedName: source.name, entryIdentity: entry.identity, error: err.message },
        "entry skipped, extraction failed",
      );
      continue;
    }

    const outcome = await ctx.dispatcher.dispatch(payload);
    if (!outcome.success) {
      // Not recorded: the entry stays unseen and is retried next cycle.
      tally.failed++;
      continue;
    }

    ctx.store.record(identity, entry.identity, new Date(ctx.clock.now()));
    tally.dispatched++;
  }

  ctx.logger.info(
    {
      topic: ctx.topic,
      feedName: source.name,
      dispatched: tally.dispatched,
      failed: tally.failed,
      skipped: tally.skipped,
      deferred: tally.deferred,
    },
    "feed processed",
  );
  return tally;
}

function totals(groups: ReadonlyArray<GroupReport>) {
  let dispatched = 0;
  let failed = 0;
  let feedErrors = 0;
  for (const group of groups) {
    for (const source of group.sources) {
      dispatched += source.dispatched;
      failed += source.failed;
      if (source.error) feedErrors++;
    }
  }
  return { dispatched, failed, feedErrors };
}

/**
 * Runs one sync cycle over `groups`: fetch, filter unseen, extract, dispatch
 * and record, in configuration order with dispatches paced by priority.
 *
 * Feed, extraction and dispatch failures stay local to their source or
 * entry. A history store failure aborts the cycle. The returned report is
 * never a rejection for either case.
 */
export async function runSyncCycle(
  groups: ReadonlyArray<FeedGroup>,
  deps: SyncDeps,
): Promise<SyncReport> {
  const { store, send, options, logger, signal } = deps;
  const clock = deps.clock ?? systemClock;
  const fetchSource = deps.fetchFeed ?? fetchFeed;

  const startedAt = new Date(clock.now());
  const gate = createFloodGate(
    { minDelayMs: options.floodMinDelayMs, maxDelayMs: options.floodMaxDelayMs },
    clock,
  );
  const dispatcher = createDispatcher({ send, gate, logger, signal });
  const limit = pLimit(options.fetchConcurrency);
  const fetchOptions: FetchOptions = {
    userAgent: options.userAgent,
    timeoutMs: options.requestTimeoutMs,
  };

  const groupReports: Array<GroupReport> = [];
  let status: SyncStatus = "completed";
  let error: string | null = null;

  logger.info({ groupCount: groups.length }, "sync cycle starting");

  try {
    for (const group of groups) {
      signal?.throwIfAborted();

      const sourceReports: Array<SourceReport> = [];
      groupReports.push({ topic: group.topic, sources: sourceReports });

      const results = await Promise.all(
        group.sources.map((source) =>
          limit(() => fetchSource(source, fetchOptions, logger)),
        ),
      );

      const ctx: SourceContext = {
        topic: group.topic,
        store,
        dispatcher,
        options,
        clock,
        logger,
      };

      for (const [index, source] of group.sources.entries()) {
        const result = results[index];
        if (!result) continue;

        const tally = emptyTally(source);
        try {
          sourceReports.push(await processSource(source, result, ctx, tally));
        } catch (err) {
          tally.error = errorMessage(err);
          sourceReports.push(tally);
          if (err instanceof StoreError || signal?.aborted) throw err;

          logger.error(
            {
              topic: group.topic,
              feedName: source.name,
              dispatched: tally.dispatched,
              error: tally.error,
            },
            "unexpected error during feed processing",
          );
        }
      }
    }
  } catch (err) {
    if (err instanceof StoreError) {
      status = "aborted";
      error = err.message;
      logger.error({ error: err.message }, "sync cycle aborted, history store failed");
    } else if (signal?.aborted) {
      status = "cancelled";
      error = errorMessage(err);
      logger.warn("sync cycle cancelled by shutdown");
    } else {
      throw err;
    }
  }

  const finishedAt = new Date(clock.now());
  logger.info(
    {
      status,
      ...totals(groupReports),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    },
    "sync cycle complete",
  );

  return { status, startedAt, finishedAt, error, groups: groupReports };
}
