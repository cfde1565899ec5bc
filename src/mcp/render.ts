import type { AddFeedResult, ItemPage } from "../core/feed-service.js";
import type { Feed, FeedItem, SyncOutcome, ValidationResult } from "../core/types.js";

const SNIPPET_LENGTH = 200;

function snippet(content: string): string {
  const text = content.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}…` : text;
}

export function renderValidation(url: string, result: ValidationResult): string {
  if (result.ok) {
    return `${url} is a valid feed` + (result.title ? `: "${result.title}"` : ".");
  }
  return `${url} is not usable (${result.failure}): ${result.reason}`;
}

export function renderSyncOutcome(outcome: SyncOutcome): string {
  const head =
    outcome.state === "done"
      ? `Feed ${outcome.feedId}: ${outcome.created} new item(s)`
      : `Feed ${outcome.feedId}: sync failed: ${outcome.error ?? "unknown error"}`;
  if (outcome.skipped.length === 0) return head;

  const counts = new Map<string, number>();
  for (const entry of outcome.skipped) {
    counts.set(entry.reason, (counts.get(entry.reason) ?? 0) + 1);
  }
  const parts = [...counts].map(([reason, n]) => `${reason} ${n}`);
  return `${head}\n  Skipped: ${parts.join(", ")}`;
}

export function renderAddedFeed({ feed, sync }: AddFeedResult): string {
  return `Added feed "${feed.title ?? feed.url}" (id: ${feed.id}).\n${renderSyncOutcome(sync)}`;
}

export function renderFeedList(feeds: Feed[]): string {
  if (feeds.length === 0) return "No feeds subscribed.";

  return feeds
    .map((feed) => {
      const fetched = feed.lastFetchedAt ? feed.lastFetchedAt.toISOString() : "never";
      return `• ${feed.title ?? "(untitled)"} (id: "${feed.id}")\n  URL: ${feed.url} | Last new items: ${fetched}`;
    })
    .join("\n\n");
}

export function renderItems(page: ItemPage, offset = 0): string {
  if (page.items.length === 0) return "No feed items found.";

  const body = page.items
    .map(
      (item: FeedItem, i) =>
        `[${offset + i + 1}] ${item.title}${item.isRead ? "" : " (unread)"}\n` +
        `    Id: ${item.id}\n` +
        `    Feed: ${item.feedId}\n` +
        `    Date: ${item.publishedAt.toISOString()}\n` +
        `    ${snippet(item.content)}`,
    )
    .join("\n\n");
  return `${body}\n\nShowing ${page.items.length} of ${page.total}.`;
}
