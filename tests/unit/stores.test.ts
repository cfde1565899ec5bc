/**
 * Unit tests for the in-memory feed and item stores.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { DuplicateFeedError, DuplicateItemError } from "../../src/core/errors.js";
import { InMemoryFeedStore } from "../../src/stores/feed-store.js";
import { InMemoryItemStore } from "../../src/stores/item-store.js";

function clock(start: number) {
  let t = start;
  return () => new Date(t++);
}

describe("InMemoryFeedStore", () => {
  it("rejects a second feed with the same URL", async () => {
    const store = new InMemoryFeedStore();
    await store.create("https://example.com/feed");

    await expect(store.create("https://example.com/feed")).rejects.toBeInstanceOf(DuplicateFeedError);
  });

  it("lists feeds in the order they were added", async () => {
    const store = new InMemoryFeedStore(clock(1000));
    const a = await store.create("https://example.com/a");
    const b = await store.create("https://example.com/b");

    expect((await store.list()).map((f) => f.id)).toEqual([a.id, b.id]);
    expect((await store.getByUrl("https://example.com/b"))?.id).toBe(b.id);
  });

  it("sets the title only while it is unset", async () => {
    const store = new InMemoryFeedStore();
    const feed = await store.create("https://example.com/feed");

    expect(await store.setTitleIfMissing(feed.id, "One")).toBe(true);
    expect(await store.setTitleIfMissing(feed.id, "Two")).toBe(false);
    expect((await store.get(feed.id))?.title).toBe("One");
  });

  it("deletes feeds", async () => {
    const store = new InMemoryFeedStore();
    const feed = await store.create("https://example.com/feed");

    expect(await store.delete(feed.id)).toBe(true);
    expect(await store.delete(feed.id)).toBe(false);
    expect(await store.get(feed.id)).toBeNull();
  });
});

describe("InMemoryItemStore", () => {
  let store: InMemoryItemStore;

  beforeEach(async () => {
    store = new InMemoryItemStore(clock(5000));
    await store.create({ feedId: "f1", guid: "1", title: "Rust tips", content: "borrowing", publishedAt: new Date(300) });
    await store.create({ feedId: "f1", guid: "2", title: "Cooking", content: "Pasta with RUST-coloured sauce", publishedAt: new Date(100) });
    await store.create({ feedId: "f2", guid: "1", title: "Gardening", content: "", publishedAt: new Date(200) });
  });

  it("enforces one item per feed and guid", async () => {
    await expect(
      store.create({ feedId: "f1", guid: "1", title: "Again", content: "", publishedAt: new Date(0) }),
    ).rejects.toBeInstanceOf(DuplicateItemError);
    expect(await store.exists("f1", "1")).toBe(true);
    expect(await store.exists("f2", "2")).toBe(false);
  });

  it("orders by publishedAt, newest first, by default", async () => {
    expect((await store.query({})).map((i) => i.title)).toEqual(["Rust tips", "Gardening", "Cooking"]);
  });

  it("orders by createdAt when asked", async () => {
    const items = await store.query({ orderBy: "createdAt", direction: "asc" });
    expect(items.map((i) => i.title)).toEqual(["Rust tips", "Cooking", "Gardening"]);
  });

  it("filters by feed and searches title and content case-insensitively", async () => {
    expect((await store.query({ feedId: "f2" })).map((i) => i.title)).toEqual(["Gardening"]);
    expect((await store.query({ search: "rust" })).map((i) => i.title)).toEqual(["Rust tips", "Cooking"]);
    expect(await store.count({ search: "rust" })).toBe(2);
  });

  it("pages with limit and offset", async () => {
    expect((await store.query({ limit: 1, offset: 1 })).map((i) => i.title)).toEqual(["Gardening"]);
  });

  it("marks unread items read and counts only the changes", async () => {
    const [first] = await store.query({ feedId: "f1", limit: 1 });
    await store.setRead(first.id, true);

    expect(await store.markRead({ feedId: "f1" })).toBe(1);
    expect(await store.markRead({ feedId: "f1" })).toBe(0);
    expect(await store.count({ isRead: false })).toBe(1);
  });

  it("returns null when setting read on an unknown item", async () => {
    expect(await store.setRead("missing", true)).toBeNull();
  });

  it("deletes a feed's items and frees their guids", async () => {
    await store.deleteByFeed("f1");

    expect(await store.count()).toBe(1);
    expect(await store.exists("f1", "1")).toBe(false);
  });
});
