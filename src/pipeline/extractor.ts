// pattern: functional-core
import * as cheerio from "cheerio";
import { ExtractionError } from "./errors";
import type { Entry, FeedSource, NotificationPayload } from "./types";

export const DEFAULT_TAGS: ReadonlyArray<string> = ["newspaper"];
export const DEFAULT_DESCRIPTION_LENGTH = 500;

const ELLIPSIS = "...";

const BLOCK_ELEMENTS =
  "p, div, br, li, ul, ol, h1, h2, h3, h4, h5, h6, blockquote, pre, tr, td, th, figure, figcaption, section, article, header, footer";

export type ExtractionResult = {
  readonly description: string;
  readonly imageUrl: string | null;
};

export type ExtractOptions = {
  readonly maxLength: number;
  /** Base for resolving relative image sources, usually the entry link. */
  readonly baseUrl?: string;
};

export type PayloadOptions = {
  readonly maxDescriptionLength: number;
  readonly markdown: boolean;
  /** IANA zone the publish time is shown in. */
  readonly timeZone: string;
};

/**
 * Cuts `text` to at most `maxLength` characters, breaking on the last space
 * that fits and marking the cut with an ellipsis.
 */
export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const budget = Math.max(0, maxLength - ELLIPSIS.length);
  const window = text.slice(0, budget + 1);
  const boundary = window.lastIndexOf(" ");
  const cut = boundary > 0 ? window.slice(0, boundary) : text.slice(0, budget);

  return `${cut.trimEnd()}${ELLIPSIS}`;
}

function parseUrl(value: string, base?: string): URL | null {
  try {
    return new URL(value, base);
  } catch {
    return null;
  }
}

/**
 * Resolves `value` to an absolute http(s) URL in its ASCII form: the host in
 * punycode, the path and query percent-encoded, so it fits an HTTP header.
 * A base that is not itself an absolute URL is ignored.
 */
export function resolveHttpUrl(
  value: string | null | undefined,
  baseUrl?: string | null,
): string | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const base = baseUrl ? parseUrl(baseUrl.trim()) : null;
  const url = parseUrl(trimmed, base?.href);
  if (!url) return null;

  return url.protocol === "http:" || url.protocol === "https:" ? url.href : null;
}

/**
 * Formats `date` as `YYYY-MM-DD HH:mm:ss` wall-clock time in `timeZone`.
 */
export function formatLocalTime(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}:${part("second")}`;
}

/**
 * Reduces HTML (or plain text) to a one-paragraph description and finds the
 * first inline image. Never throws; missing parts come back empty.
 */
export function extractContent(
  rawContent: string,
  options: ExtractOptions,
): ExtractionResult {
  if (!rawContent.trim()) {
    return { description: "", imageUrl: null };
  }

  const $ = cheerio.load(rawContent);

  const src = $("img[src]").first().attr("src");
  const imageUrl = resolveHttpUrl(src, options.baseUrl);

  $("script, style, noscript").remove();
  // Separate adjacent blocks so their words do not run together.
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).before(" ").after(" ");
  });

  const text = $("body").text().replace(/\s+/g, " ").trim();

  return {
    description: truncateAtWord(text, options.maxLength),
    imageUrl,
  };
}

function uniqueTags(tags: ReadonlyArray<string> | undefined): Array<string> {
  const cleaned = (tags ?? [])
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
  const source = cleaned.length > 0 ? cleaned : DEFAULT_TAGS;
  return [...new Set(source)];
}

function markdownMessage(
  source: FeedSource,
  description: string,
  link: string | null,
  localTime: string | null,
): string {
  const header = [`**Source:** ${source.name}`];
  if (localTime) header.push(`**Local Time:** ${localTime}`);

  const parts = [header.join("\n")];
  if (description) parts.push(description);
  if (link) parts.push(`[Read on website](${link})`);
  return parts.join("\n\n");
}

/**
 * Builds the notification for one entry of `source`.
 *
 * @throws ExtractionError when the entry has no title.
 */
export function buildPayload(
  topic: string,
  source: FeedSource,
  entry: Entry,
  options: PayloadOptions,
): NotificationPayload {
  const title = entry.title?.trim();
  if (!title) {
    throw new ExtractionError(
      entry.identity,
      `entry ${entry.identity} from ${source.name} has no title`,
    );
  }

  const link = resolveHttpUrl(entry.link, source.url);
  const { description, imageUrl } = extractContent(entry.rawContent, {
    maxLength: options.maxDescriptionLength,
    baseUrl: link ?? undefined,
  });
  const publishedAt = entry.publishedAt
    ? formatLocalTime(entry.publishedAt, options.timeZone)
    : null;

  const message = options.markdown
    ? markdownMessage(source, description, link, publishedAt)
    : description || title;

  return {
    topic,
    title,
    message,
    priority: source.priority,
    tags: uniqueTags(source.tags),
    icon: resolveHttpUrl(source.icon),
    attachment: resolveHttpUrl(entry.mediaUrl, link) ?? imageUrl,
    clickUrl: link,
    publishedAt,
    markdown: options.markdown,
  };
}
