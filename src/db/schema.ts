import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";

// ── Feeds ────────────────────────────────────────────────────────

export const feeds = pgTable(
  "feeds",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    url: text("url").notNull().unique(),
    title: text("title"),
    lastFetchedAt: timestamp("last_fetched_at", { withTimezone: true }),
    addedAt: timestamp("added_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [index("feeds_last_fetched_at_idx").on(t.lastFetchedAt)],
);

// ── Feed items ───────────────────────────────────────────────────

export const feedItems = pgTable(
  "feed_items",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    feedId: uuid("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    guid: text("guid").notNull(),
    title: text("title").notNull(),
    content: text("content").notNull().default(""),
    publishedAt: timestamp("published_at", { withTimezone: true }).notNull(),
    isRead: boolean("is_read").default(false).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    uniqueIndex("feed_items_feed_id_guid_key").on(t.feedId, t.guid),
    index("feed_items_feed_id_published_at_idx").on(t.feedId, t.publishedAt),
    index("feed_items_is_read_idx").on(t.isRead),
  ],
);
