import { describe, it, expect, vi } from "vitest";
import { createMemoryHistoryStore, createSqliteHistoryStore } from "../history";
import { createTestDatabase, makeEntry } from "../test-utils/db";
import { feedIdentity, filterUnseen } from "./dedup";

const FEED = feedIdentity("news", "https://example.com/rss");

describe("feedIdentity", () => {
  it("should combine topic and url", () => {
    expect(feedIdentity("news", "https://example.com/rss")).toBe(
      "news|https://example.com/rss",
    );
  });
});

describe("filterUnseen", () => {
  it("should return every entry when nothing is recorded", () => {
    const store = createMemoryHistoryStore();
    const entries = [makeEntry("a"), makeEntry("b"), makeEntry("c")];

    const result = filterUnseen(store, FEED, entries);

    expect(result.unseen.map((e) => e.identity)).toEqual(["a", "b", "c"]);
    expect(result.skippedCount).toBe(0);
  });

  it("should drop recorded entries and keep input order", () => {
    const store = createMemoryHistoryStore();
    store.record(FEED, "b", new Date());
    store.record(FEED, "d", new Date());

    const entries = ["a", "b", "c", "d", "e"].map((id) => makeEntry(id));
    const result = filterUnseen(store, FEED, entries);

    expect(result.unseen.map((e) => e.identity)).toEqual(["a", "c", "e"]);
    expect(result.skippedCount).toBe(2);
  });

  it("should yield the same unseen set when run twice without recording", () => {
    const store = createSqliteHistoryStore(createTestDatabase());
    store.record(FEED, "a", new Date());
    const entries = [makeEntry("a"), makeEntry("b"), makeEntry("c")];

    const first = filterUnseen(store, FEED, entries);
    const second = filterUnseen(store, FEED, entries);

    expect(second.unseen).toEqual(first.unseen);
    expect(second.unseen.map((e) => e.identity)).toEqual(["b", "c"]);
  });

  it("should never return an entry once it is recorded", () => {
    const store = createSqliteHistoryStore(createTestDatabase());
    const entries = [makeEntry("a"), makeEntry("b")];

    store.record(FEED, "a", new Date());

    expect(filterUnseen(store, FEED, entries).unseen.map((e) => e.identity)).toEqual([
      "b",
    ]);
  });

  it("should not treat entries recorded for another feed as seen", () => {
    const store = createMemoryHistoryStore();
    store.record(feedIdentity("other", "https://example.com/rss"), "a", new Date());

    const result = filterUnseen(store, FEED, [makeEntry("a")]);

    expect(result.unseen).toHaveLength(1);
  });

  it("should collapse repeated identities within one batch", () => {
    const store = createMemoryHistoryStore();
    const entries = [
      makeEntry("a", { title: "First copy" }),
      makeEntry("b"),
      makeEntry("a", { title: "Second copy" }),
    ];

    const result = filterUnseen(store, FEED, entries);

    expect(result.unseen.map((e) => e.title)).toEqual(["First copy", "Entry b"]);
    expect(result.skippedCount).toBe(1);
  });

  it("should not write to the store", () => {
    const store = createMemoryHistoryStore();
    const record = vi.spyOn(store, "record");

    filterUnseen(store, FEED, [makeEntry("a")]);

    expect(record).not.toHaveBeenCalled();
    expect(store.count()).toBe(0);
  });

  it("should handle an empty batch", () => {
    const result = filterUnseen(createMemoryHistoryStore(), FEED, []);

    expect(result).toEqual({ unseen: [], skippedCount: 0 });
  });
});
