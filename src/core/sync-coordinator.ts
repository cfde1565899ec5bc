import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { FeedStore } from "../stores/feed-store.js";
import type { ItemStore } from "../stores/item-store.js";
import { DuplicateItemError, errorMessage } from "./errors.js";
import { extract } from "./extractor.js";
import { hasUsableContent, isMalformed, parseError } from "./parse-result.js";
import type {
  ExtractedItem,
  Feed,
  FeedSourceParser,
  NewFeedItem,
  SkippedEntry,
  SyncOutcome,
  SyncPhase,
} from "./types.js";
import { NOT_A_FEED } from "./validator.js";

// ── Semaphore for concurrency control ─────────────────────────

export class Semaphore {
  private queue: (() => void)[] = [];
  private running = 0;

  constructor(private max: number) {}

  async acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running++;
      return;
    }
    return new Promise<void>((resolve) => this.queue.push(resolve));
  }

  release(): void {
    this.running--;
    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }
}

export interface SyncCoordinatorOptions {
  /** Default fan-out for syncMany. */
  concurrency?: number;
  now?: () => Date;
  log?: Logger;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

export const SYNC_ABORTED = "sync aborted";

export class SyncCoordinator {
  private readonly concurrency: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private parser: FeedSourceParser,
    private feeds: FeedStore,
    private items: ItemStore,
    options: SyncCoordinatorOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 4;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? silentLogger;
  }

  // ── Fan-out ─────────────────────────────────────────────────

  /** Syncs independent feeds in parallel, at most `concurrency` at a time. */
  async syncMany(
    feeds: Feed[],
    options: SyncOptions & { concurrency?: number } = {},
  ): Promise<SyncOutcome[]> {
    const semaphore = new Semaphore(Math.max(1, options.concurrency ?? this.concurrency));
    return Promise.all(
      feeds.map(async (feed) => {
        await semaphore.acquire();
        try {
          return await this.sync(feed, { signal: options.signal });
        } finally {
          semaphore.release();
        }
      }),
    );
  }

  // ── Core sync pipeline ──────────────────────────────────────

  /**
   * fetching → parsed → (failed | extracting → deduping → persisting → done).
   * Never throws; per-entry problems end up in `skipped`.
   */
  async sync(feed: Feed, options: SyncOptions = {}): Promise<SyncOutcome> {
    const { signal } = options;
    const log = this.log.child({ feedId: feed.id, url: feed.url });
    const skipped: SkippedEntry[] = [];
    let created = 0;

    const enter = (phase: SyncPhase) => log.debug("Sync phase", { phase });
    const fail = (error: string): SyncOutcome => {
      enter("failed");
      log.warn("Feed sync failed", { error, created });
      return { feedId: feed.id, state: "failed", created, error, skipped };
    };
    const skip = (entry: SkippedEntry) => {
      skipped.push(entry);
      const level = entry.reason === "missing-guid" || entry.reason === "extraction-failed" ? "warn" : "debug";
      log[level]("Skipping entry", { ...entry });
    };

    try {
      enter("fetching");
      const result = await this.parser.parse({ url: feed.url, signal });
      enter("parsed");

      if (result.outcome.status === "failed") return fail(result.outcome.reason);
      if (!hasUsableContent(result)) return fail(NOT_A_FEED);
      if (isMalformed(result)) {
        log.warn("Feed has format problems; using what parsed", { diagnostic: parseError(result) });
      }
      if (signal?.aborted) return fail(SYNC_ABORTED);

      if (feed.title === null && result.title) {
        await this.feeds.setTitleIfMissing(feed.id, result.title);
      }

      enter("extracting");
      const extracted: { index: number; item: ExtractedItem }[] = [];
      result.entries.forEach((entry, index) => {
        try {
          extracted.push({ index, item: extract(entry) });
        } catch (err) {
          skip({ index, reason: "extraction-failed", detail: errorMessage(err) });
        }
      });

      enter("deduping");
      const staged: { index: number; item: NewFeedItem }[] = [];
      const seen = new Set<string>();
      for (const { index, item } of extracted) {
        if (signal?.aborted) return fail(SYNC_ABORTED);
        const { guid } = item;
        if (!guid) {
          skip({ index, reason: "missing-guid", detail: item.title });
          continue;
        }
        if (seen.has(guid)) {
          skip({ index, guid, reason: "duplicate-in-batch" });
          continue;
        }
        seen.add(guid);
        if (await this.items.exists(feed.id, guid)) {
          skip({ index, guid, reason: "already-stored" });
          continue;
        }
        staged.push({
          index,
          item: {
            feedId: feed.id,
            guid,
            title: item.title,
            content: item.content,
            publishedAt: item.publishedAt ?? this.now(),
          },
        });
      }

      enter("persisting");
      for (const { index, item } of staged) {
        if (signal?.aborted) {
          if (created > 0) await this.feeds.markFetched(feed.id, this.now());
          return fail(SYNC_ABORTED);
        }
        try {
          await this.items.create(item);
          created++;
        } catch (err) {
          if (err instanceof DuplicateItemError) {
            skip({ index, guid: item.guid, reason: "persist-conflict" });
          } else {
            skip({ index, guid: item.guid, reason: "persist-failed", detail: errorMessage(err) });
            log.error("Failed to store feed item", { guid: item.guid, error: errorMessage(err) });
          }
        }
      }

      if (created > 0) {
        await this.feeds.markFetched(feed.id, this.now());
      }

      enter("done");
      log.info("Feed synced", { created, entries: result.entries.length, skipped: skipped.length });
      return { feedId: feed.id, state: "done", created, skipped };
    } catch (err) {
      return fail(errorMessage(err));
    }
  }
}
