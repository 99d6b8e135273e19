import pino from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { Settings } from "../config";
import type { Clock } from "../pipeline/flood";
import type { Entry, FeedSource } from "../pipeline/types";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

export const silentLogger = pino({ level: "silent" });

/**
 * Creates default Settings suitable for testing.
 */
export function createTestSettings(overrides?: Partial<Settings>): Settings {
  return {
    configDir: "configs",
    ntfyUrl: "https://ntfy.example.com",
    ntfyToken: undefined,
    dbPath: ":memory:",
    syncSchedule: "*/10 * * * *",
    runOnStart: false,
    userAgent: "FeedRelay/test",
    requestTimeoutMs: 5000,
    maxEntriesPerFeed: 3,
    descriptionMaxLength: 500,
    floodMinDelayMs: 0,
    floodMaxDelayMs: 10000,
    fetchConcurrency: 2,
    markdown: false,
    timeZone: "UTC",
    logLevel: "silent",
    ...overrides,
  };
}

export function makeSource(overrides?: Partial<FeedSource>): FeedSource {
  return {
    name: "Example Feed",
    url: "https://example.com/rss",
    priority: 3,
    ...overrides,
  };
}

export function makeEntry(identity: string, overrides?: Partial<Entry>): Entry {
  return {
    identity,
    title: `Entry ${identity}`,
    link: `https://example.com/${identity}`,
    publishedAt: null,
    rawContent: `<p>Body of ${identity}</p>`,
    mediaUrl: null,
    ...overrides,
  };
}

/**
 * Clock whose time only moves when something sleeps on it. Records every
 * sleep so pacing can be asserted without real timers.
 */
export function createFakeClock(start = 1_700_000_000_000): Clock & {
  readonly sleeps: Array<number>;
  readonly advance: (ms: number) => void;
} {
  let now = start;
  const sleeps: Array<number> = [];

  return {
    sleeps,
    now: () => now,
    sleep: async (ms, signal) => {
      signal?.throwIfAborted();
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms) => {
      now += ms;
    },
  };
}
