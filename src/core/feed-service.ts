import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { FeedStore } from "../stores/feed-store.js";
import type { ItemStore } from "../stores/item-store.js";
import { DuplicateFeedError, FeedNotFoundError, FeedRejectedError, InputError } from "./errors.js";
import type { SyncCoordinator } from "./sync-coordinator.js";
import type { Feed, FeedItem, ItemFilter, ItemQuery, SyncOutcome, ValidationResult } from "./types.js";
import { checkFeedUrl, type FeedValidator } from "./validator.js";

export interface AddFeedResult {
  feed: Feed;
  sync: SyncOutcome;
}

export interface ItemPage {
  items: FeedItem[];
  total: number;
}

const MAX_PAGE_SIZE = 200;

export class FeedService {
  constructor(
    private feeds: FeedStore,
    private items: ItemStore,
    private validator: FeedValidator,
    private sync: SyncCoordinator,
    private log: Logger = silentLogger,
  ) {}

  // ── Feeds ────────────────────────────────────────────────────

  validateFeed(url: string, signal?: AbortSignal): Promise<ValidationResult> {
    return this.validator.validate(url, signal);
  }

  /** Validates, stores and runs the first sync. The feed stays even if that sync fails. */
  async addFeed(url: string, signal?: AbortSignal): Promise<AddFeedResult> {
    const checked = checkFeedUrl(url);
    if (!checked.ok) throw new InputError(checked.reason);
    const normalized = checked.url.toString();

    if (await this.feeds.getByUrl(normalized)) throw new DuplicateFeedError(normalized);

    const validation = await this.validator.validate(normalized, signal);
    if (!validation.ok) {
      throw new FeedRejectedError(normalized, validation.failure, validation.reason);
    }

    const feed = await this.feeds.create(normalized);
    this.log.info("Feed added", { feedId: feed.id, url: normalized });
    const sync = await this.sync.sync(feed, { signal });
    return { feed: (await this.feeds.get(feed.id)) ?? feed, sync };
  }

  async refreshFeed(feedId: string, signal?: AbortSignal): Promise<SyncOutcome> {
    return this.sync.sync(await this.requireFeed(feedId), { signal });
  }

  async refreshAll(signal?: AbortSignal): Promise<SyncOutcome[]> {
    const feeds = await this.feeds.list();
    const outcomes = await this.sync.syncMany(feeds, { signal });
    this.log.info("Refreshed all feeds", {
      feeds: feeds.length,
      failed: outcomes.filter((o) => o.state === "failed").length,
      created: outcomes.reduce((sum, o) => sum + o.created, 0),
    });
    return outcomes;
  }

  getFeed(feedId: string): Promise<Feed | null> {
    return this.feeds.get(feedId);
  }

  listFeeds(): Promise<Feed[]> {
    return this.feeds.list();
  }

  async deleteFeed(feedId: string): Promise<void> {
    await this.requireFeed(feedId);
    await this.items.deleteByFeed(feedId);
    await this.feeds.delete(feedId);
    this.log.info("Feed deleted", { feedId });
  }

  // ── Items ────────────────────────────────────────────────────

  async listItems(query: ItemQuery = {}): Promise<ItemPage> {
    const limit = Math.min(Math.max(query.limit ?? 50, 1), MAX_PAGE_SIZE);
    const offset = Math.max(query.offset ?? 0, 0);
    const [items, total] = await Promise.all([
      this.items.query({ ...query, limit, offset }),
      this.items.count({ feedId: query.feedId, isRead: query.isRead, search: query.search }),
    ]);
    return { items, total };
  }

  /** Returns 1 when the read flag changed, 0 when it already had that value. */
  async markItemRead(itemId: string, isRead = true): Promise<number> {
    const item = await this.items.get(itemId);
    if (!item) throw new InputError(`Item not found: ${itemId}`);
    if (item.isRead === isRead) return 0;
    await this.items.setRead(itemId, isRead);
    return 1;
  }

  async markAllRead(feedId: string): Promise<number> {
    await this.requireFeed(feedId);
    return this.items.markRead({ feedId });
  }

  markItemsRead(filter: ItemFilter): Promise<number> {
    return this.items.markRead(filter);
  }

  private async requireFeed(feedId: string): Promise<Feed> {
    const feed = await this.feeds.get(feedId);
    if (!feed) throw new FeedNotFoundError(feedId);
    return feed;
  }
}
