import { randomUUID } from "node:crypto";
import { and, asc, desc, eq, ilike, or, sql, type SQL } from "drizzle-orm";
import { DuplicateItemError } from "../core/errors.js";
import type { FeedItem, ItemFilter, ItemQuery, NewFeedItem } from "../core/types.js";
import { getDb, schema } from "../db/index.js";

export const DEFAULT_ITEM_LIMIT = 50;

export interface ItemStore {
  exists(feedId: string, guid: string): Promise<boolean>;
  /** Throws DuplicateItemError when (feedId, guid) is taken. */
  create(item: NewFeedItem): Promise<FeedItem>;
  get(id: string): Promise<FeedItem | null>;
  /** Newest publishedAt first unless the query says otherwise. */
  query(query: ItemQuery): Promise<FeedItem[]>;
  count(filter?: ItemFilter): Promise<number>;
  setRead(id: string, isRead: boolean): Promise<FeedItem | null>;
  /** Marks matching unread items read; returns how many changed. */
  markRead(filter: ItemFilter): Promise<number>;
  deleteByFeed(feedId: string): Promise<void>;
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function filterConditions(filter: ItemFilter): SQL[] {
  const conditions: SQL[] = [];
  if (filter.feedId !== undefined) {
    conditions.push(eq(schema.feedItems.feedId, filter.feedId));
  }
  if (filter.isRead !== undefined) {
    conditions.push(eq(schema.feedItems.isRead, filter.isRead));
  }
  if (filter.search) {
    const needle = `%${escapeLike(filter.search)}%`;
    const match = or(ilike(schema.feedItems.title, needle), ilike(schema.feedItems.content, needle));
    if (match) conditions.push(match);
  }
  return conditions;
}

export class PgItemStore implements ItemStore {
  async exists(feedId: string, guid: string): Promise<boolean> {
    const db = getDb();
    const [row] = await db
      .select({ id: schema.feedItems.id })
      .from(schema.feedItems)
      .where(and(eq(schema.feedItems.feedId, feedId), eq(schema.feedItems.guid, guid)))
      .limit(1);
    return row !== undefined;
  }

  async create(item: NewFeedItem): Promise<FeedItem> {
    const db = getDb();
    const [row] = await db
      .insert(schema.feedItems)
      .values({
        feedId: item.feedId,
        guid: item.guid,
        title: item.title,
        content: item.content,
        publishedAt: item.publishedAt,
      })
      .onConflictDoNothing({ target: [schema.feedItems.feedId, schema.feedItems.guid] })
      .returning();
    if (!row) throw new DuplicateItemError(item.feedId, item.guid);
    return rowToFeedItem(row);
  }

  async get(id: string): Promise<FeedItem | null> {
    const db = getDb();
    const [row] = await db.select().from(schema.feedItems).where(eq(schema.feedItems.id, id)).limit(1);
    return row ? rowToFeedItem(row) : null;
  }

  async query(query: ItemQuery): Promise<FeedItem[]> {
    const db = getDb();
    const conditions = filterConditions(query);
    const column = query.orderBy === "createdAt" ? schema.feedItems.createdAt : schema.feedItems.publishedAt;
    const direction = query.direction === "asc" ? asc : desc;
    const rows = await db
      .select()
      .from(schema.feedItems)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(direction(column), direction(schema.feedItems.createdAt))
      .limit(query.limit ?? DEFAULT_ITEM_LIMIT)
      .offset(query.offset ?? 0);
    return rows.map(rowToFeedItem);
  }

  async count(filter: ItemFilter = {}): Promise<number> {
    const db = getDb();
    const conditions = filterConditions(filter);
    const [row] = await db
      .select({ count: sql<number>`count(*)::int` })
      .from(schema.feedItems)
      .where(conditions.length > 0 ? and(...conditions) : undefined);
    return row?.count ?? 0;
  }

  async setRead(id: string, isRead: boolean): Promise<FeedItem | null> {
    const db = getDb();
    const [row] = await db
      .update(schema.feedItems)
      .set({ isRead })
      .where(eq(schema.feedItems.id, id))
      .returning();
    return row ? rowToFeedItem(row) : null;
  }

  async markRead(filter: ItemFilter): Promise<number> {
    const db = getDb();
    const conditions = filterConditions({ ...filter, isRead: false });
    const rows = await db
      .update(schema.feedItems)
      .set({ isRead: true })
      .where(and(...conditions))
      .returning({ id: schema.feedItems.id });
    return rows.length;
  }

  // Rows go with the feed via ON DELETE CASCADE; this covers explicit cleanup.
  async deleteByFeed(feedId: string): Promise<void> {
    const db = getDb();
    await db.delete(schema.feedItems).where(eq(schema.feedItems.feedId, feedId));
  }
}

function rowToFeedItem(row: typeof schema.feedItems.$inferSelect): FeedItem {
  return {
    id: row.id,
    feedId: row.feedId,
    guid: row.guid,
    title: row.title,
    content: row.content,
    publishedAt: row.publishedAt,
    isRead: row.isRead,
    createdAt: row.createdAt,
  };
}

// ── In-memory store (tests, local experiments) ───────────────────

export class InMemoryItemStore implements ItemStore {
  private items = new Map<string, FeedItem>();
  private keys = new Set<string>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private static key(feedId: string, guid: string): string {
    return `${feedId}\u0000${guid}`;
  }

  private matches(item: FeedItem, filter: ItemFilter): boolean {
    if (filter.feedId !== undefined && item.feedId !== filter.feedId) return false;
    if (filter.isRead !== undefined && item.isRead !== filter.isRead) return false;
    if (filter.search) {
      const needle = filter.search.toLowerCase();
      if (!item.title.toLowerCase().includes(needle) && !item.content.toLowerCase().includes(needle)) {
        return false;
      }
    }
    return true;
  }

  async exists(feedId: string, guid: string): Promise<boolean> {
    return this.keys.has(InMemoryItemStore.key(feedId, guid));
  }

  async create(item: NewFeedItem): Promise<FeedItem> {
    const key = InMemoryItemStore.key(item.feedId, item.guid);
    if (this.keys.has(key)) throw new DuplicateItemError(item.feedId, item.guid);
    const stored: FeedItem = { ...item, id: randomUUID(), isRead: false, createdAt: this.now() };
    this.keys.add(key);
    this.items.set(stored.id, stored);
    return { ...stored };
  }

  async get(id: string): Promise<FeedItem | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async query(query: ItemQuery): Promise<FeedItem[]> {
    const field = query.orderBy ?? "publishedAt";
    const sign = query.direction === "asc" ? 1 : -1;
    const offset = query.offset ?? 0;
    return [...this.items.values()]
      .filter((item) => this.matches(item, query))
      .sort(
        (a, b) =>
          sign * (a[field].getTime() - b[field].getTime()) ||
          sign * (a.createdAt.getTime() - b.createdAt.getTime()),
      )
      .slice(offset, offset + (query.limit ?? DEFAULT_ITEM_LIMIT))
      .map((item) => ({ ...item }));
  }

  async count(filter: ItemFilter = {}): Promise<number> {
    let n = 0;
    for (const item of this.items.values()) {
      if (this.matches(item, filter)) n++;
    }
    return n;
  }

  async setRead(id: string, isRead: boolean): Promise<FeedItem | null> {
    const item = this.items.get(id);
    if (!item) return null;
    item.isRead = isRead;
    return { ...item };
  }

  async markRead(filter: ItemFilter): Promise<number> {
    let changed = 0;
    for (const item of this.items.values()) {
      if (!item.isRead && this.matches(item, filter)) {
        item.isRead = true;
        changed++;
      }
    }
    return changed;
  }

  async deleteByFeed(feedId: string): Promise<void> {
    for (const [id, item] of this.items) {
      if (item.feedId === feedId) {
        this.items.delete(id);
        this.keys.delete(InMemoryItemStore.key(item.feedId, item.guid));
      }
    }
  }
}
