import { randomUUID } from "node:crypto";
import { and, asc, eq, isNull } from "drizzle-orm";
import { DuplicateFeedError } from "../core/errors.js";
import type { Feed } from "../core/types.js";
import { getDb, schema } from "../db/index.js";

export interface FeedStore {
  /** Throws DuplicateFeedError when the URL is already subscribed. */
  create(url: string): Promise<Feed>;
  get(id: string): Promise<Feed | null>;
  getByUrl(url: string): Promise<Feed | null>;
  list(): Promise<Feed[]>;
  /** Fills the title only while it is still unset; returns whether it wrote. */
  setTitleIfMissing(id: string, title: string): Promise<boolean>;
  markFetched(id: string, at: Date): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export class PgFeedStore implements FeedStore {
  async create(url: string): Promise<Feed> {
    const db = getDb();
    const [row] = await db
      .insert(schema.feeds)
      .values({ url })
      .onConflictDoNothing({ target: schema.feeds.url })
      .returning();
    if (!row) throw new DuplicateFeedError(url);
    return rowToFeed(row);
  }

  async get(id: string): Promise<Feed | null> {
    const db = getDb();
    const [row] = await db.select().from(schema.feeds).where(eq(schema.feeds.id, id)).limit(1);
    return row ? rowToFeed(row) : null;
  }

  async getByUrl(url: string): Promise<Feed | null> {
    const db = getDb();
    const [row] = await db.select().from(schema.feeds).where(eq(schema.feeds.url, url)).limit(1);
    return row ? rowToFeed(row) : null;
  }

  async list(): Promise<Feed[]> {
    const db = getDb();
    const rows = await db.select().from(schema.feeds).orderBy(asc(schema.feeds.addedAt));
    return rows.map(rowToFeed);
  }

  async setTitleIfMissing(id: string, title: string): Promise<boolean> {
    const db = getDb();
    const rows = await db
      .update(schema.feeds)
      .set({ title })
      .where(and(eq(schema.feeds.id, id), isNull(schema.feeds.title)))
      .returning({ id: schema.feeds.id });
    return rows.length > 0;
  }

  async markFetched(id: string, at: Date): Promise<void> {
    const db = getDb();
    await db.update(schema.feeds).set({ lastFetchedAt: at }).where(eq(schema.feeds.id, id));
  }

  async delete(id: string): Promise<boolean> {
    const db = getDb();
    const rows = await db
      .delete(schema.feeds)
      .where(eq(schema.feeds.id, id))
      .returning({ id: schema.feeds.id });
    return rows.length > 0;
  }
}

function rowToFeed(row: typeof schema.feeds.$inferSelect): Feed {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    lastFetchedAt: row.lastFetchedAt,
    addedAt: row.addedAt,
  };
}

// ── In-memory store (tests, local experiments) ───────────────────

export class InMemoryFeedStore implements FeedStore {
  private feeds = new Map<string, Feed>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(url: string): Promise<Feed> {
    for (const feed of this.feeds.values()) {
      if (feed.url === url) throw new DuplicateFeedError(url);
    }
    const feed: Feed = { id: randomUUID(), url, title: null, lastFetchedAt: null, addedAt: this.now() };
    this.feeds.set(feed.id, feed);
    return { ...feed };
  }

  async get(id: string): Promise<Feed | null> {
    const feed = this.feeds.get(id);
    return feed ? { ...feed } : null;
  }

  async getByUrl(url: string): Promise<Feed | null> {
    for (const feed of this.feeds.values()) {
      if (feed.url === url) return { ...feed };
    }
    return null;
  }

  async list(): Promise<Feed[]> {
    return [...this.feeds.values()]
      .sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime())
      .map((feed) => ({ ...feed }));
  }

  async setTitleIfMissing(id: string, title: string): Promise<boolean> {
    const feed = this.feeds.get(id);
    if (!feed || feed.title !== null) return false;
    feed.title = title;
    return true;
  }

  async markFetched(id: string, at: Date): Promise<void> {
    const feed = this.feeds.get(id);
    if (feed) feed.lastFetchedAt = at;
  }

  async delete(id: string): Promise<boolean> {
    return this.feeds.delete(id);
  }
}
