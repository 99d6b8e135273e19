import { createHash } from "node:crypto";
import Parser from "rss-parser";
import type { Logger } from "pino";
import { z } from "zod";
import { FetchError, errorMessage } from "./errors";
import type { Entry, FeedSource } from "./types";

/** Format-independent view of one feed item, before identity is assigned. */
export type RawFeedItem = {
  readonly guid: string | null;
  readonly title: string | null;
  readonly link: string | null;
  readonly publishedAt: Date | null;
  readonly content: string;
  readonly mediaUrl: string | null;
};

/**
 * Parsing strategy for a feed body. Items come back in the order the feed
 * lists them.
 */
export type FeedParser = (body: string) => Promise<ReadonlyArray<RawFeedItem>>;

export type FetchOptions = {
  readonly userAgent: string;
  readonly timeoutMs: number;
  readonly parse?: FeedParser;
};

export type FetchResult =
  | { readonly success: true; readonly entries: ReadonlyArray<Entry> }
  | { readonly success: false; readonly error: FetchError };

type CustomItem = {
  id?: string;
  "content:encoded"?: string;
  mediaContent?: unknown;
  mediaThumbnail?: unknown;
};

const mediaElementsSchema = z.array(
  z.object({
    $: z.object({
      url: z.string().min(1),
      medium: z.string().optional(),
      type: z.string().optional(),
    }),
  }),
);

const FEED_ACCEPT =
  "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.5";

function isImageType(type: string | undefined): boolean {
  return type === undefined || type === "" || type.startsWith("image/");
}

function firstMediaImage(value: unknown): string | null {
  const parsed = mediaElementsSchema.safeParse(value);
  if (!parsed.success) return null;

  const image = parsed.data.find(({ $ }) =>
    $.medium !== undefined ? $.medium === "image" : isImageType($.type),
  );
  return image?.$.url ?? null;
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

// rss-parser hands back the raw xml2js node for some empty elements
// (`<guid isPermaLink="false"/>`), so values are not always strings.
function nonEmpty(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function createRssParser(): FeedParser {
  const parser = new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [
        ["media:content", "mediaContent", { keepArray: true }],
        ["media:thumbnail", "mediaThumbnail", { keepArray: true }],
      ],
    },
  });

  return async (body) => {
    const feed = await parser.parseString(body);

    return feed.items.map((item) => {
      const enclosure =
        item.enclosure && isImageType(item.enclosure.type)
          ? item.enclosure.url
          : null;

      return {
        guid: nonEmpty(item.guid) ?? nonEmpty(item.id),
        title: nonEmpty(item.title),
        link: nonEmpty(item.link),
        publishedAt: parseDate(item.isoDate ?? item.pubDate),
        content:
          [item["content:encoded"], item.content, item.summary].find(
            (value): value is string => typeof value === "string",
          ) ?? "",
        mediaUrl:
          firstMediaImage(item.mediaContent) ??
          firstMediaImage(item.mediaThumbnail) ??
          enclosure,
      };
    });
  };
}

/** GUID when the feed supplies one, otherwise a digest of link and title. */
export function entryIdentity(item: RawFeedItem): string {
  if (item.guid) return item.guid;
  return createHash("sha256")
    .update(`${item.link ?? ""}\n${item.title ?? ""}`)
    .digest("hex");
}

/**
 * Puts items in chronological order. Feeds list newest first, so the list is
 * reversed; when every entry is dated, the dates decide.
 */
export function toChronological(entries: ReadonlyArray<Entry>): Array<Entry> {
  const reversed = [...entries].reverse();
  if (!reversed.every((entry) => entry.publishedAt !== null)) {
    return reversed;
  }
  return reversed.sort(
    (a, b) => (a.publishedAt?.getTime() ?? 0) - (b.publishedAt?.getTime() ?? 0),
  );
}

let defaultParser: FeedParser | null = null;

function getDefaultParser(): FeedParser {
  if (!defaultParser) {
    defaultParser = createRssParser();
  }
  return defaultParser;
}

/**
 * Downloads and parses one feed source. Never throws: HTTP, timeout and
 * parse failures come back as a `FetchError` in the result.
 */
export async function fetchFeed(
  source: FeedSource,
  options: FetchOptions,
  logger: Logger,
): Promise<FetchResult> {
  const fail = (message: string, cause?: unknown): FetchResult => {
    logger.error(
      { feedName: source.name, feedUrl: source.url, error: message },
      "feed fetch failed",
    );
    return {
      success: false,
      error: new FetchError(source.name, source.url, message, { cause }),
    };
  };

  let body: string;
  try {
    const response = await fetch(source.url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: FEED_ACCEPT,
      },
    });

    if (!response.ok) {
      return fail(`HTTP ${response.status}: ${response.statusText}`);
    }

    body = await response.text();
  } catch (err) {
    return fail(errorMessage(err), err);
  }

  let items: ReadonlyArray<RawFeedItem>;
  try {
    const parse = options.parse ?? getDefaultParser();
    items = await parse(body);
  } catch (err) {
    return fail(`unparsable feed: ${errorMessage(err)}`, err);
  }

  const entries = toChronological(
    items.map((item) => ({
      identity: entryIdentity(item),
      title: item.title,
      link: item.link ?? "",
      publishedAt: item.publishedAt,
      rawContent: item.content,
      mediaUrl: item.mediaUrl,
    })),
  );

  logger.info(
    { feedName: source.name, itemCount: entries.length },
    "feed fetched successfully",
  );
  return { success: true, entries };
}
