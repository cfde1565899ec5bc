import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import type { FeedService } from "../core/feed-service.js";
import {
  renderAddedFeed,
  renderFeedList,
  renderItems,
  renderSyncOutcome,
  renderValidation,
} from "./render.js";

type ToolResult = { content: { type: "text"; text: string }[] };

function text(value: string): ToolResult {
  return { content: [{ type: "text" as const, text: value }] };
}

async function run(action: () => Promise<string>): Promise<ToolResult> {
  try {
    return text(await action());
  } catch (err) {
    return text(`Error: ${errorMessage(err)}`);
  }
}

export function registerTools(server: McpServer, feedService: FeedService): void {
  // ── validate_feed ─────────────────────────────────────────────

  server.tool(
    "validate_feed",
    "Check whether a URL serves an RSS or Atom feed. Stores nothing.",
    { url: z.string().describe("http(s) URL of the feed") },
    async (params) =>
      run(async () => renderValidation(params.url, await feedService.validateFeed(params.url))),
  );

  // ── add_feed ──────────────────────────────────────────────────

  server.tool(
    "add_feed",
    "Subscribe to a feed URL and ingest its current entries.",
    { url: z.string().describe("http(s) URL of the feed") },
    async (params) => run(async () => renderAddedFeed(await feedService.addFeed(params.url))),
  );

  // ── list_feeds ────────────────────────────────────────────────

  server.tool("list_feeds", "List subscribed feeds.", {}, async () =>
    run(async () => renderFeedList(await feedService.listFeeds())),
  );

  // ── refresh_feed / refresh_all_feeds ──────────────────────────

  server.tool(
    "refresh_feed",
    "Fetch one feed now and store entries not seen before.",
    { feed_id: z.string().describe("ID of the feed") },
    async (params) => run(async () => renderSyncOutcome(await feedService.refreshFeed(params.feed_id))),
  );

  server.tool("refresh_all_feeds", "Fetch every subscribed feed now.", {}, async () =>
    run(async () => {
      const outcomes = await feedService.refreshAll();
      if (outcomes.length === 0) return "No feeds subscribed.";
      return outcomes.map(renderSyncOutcome).join("\n");
    }),
  );

  // ── list_items ────────────────────────────────────────────────

  server.tool(
    "list_items",
    "List stored feed items, newest first by default.",
    {
      feed_id: z.string().optional().describe("Only items of this feed"),
      unread_only: z.boolean().optional().describe("Only unread items"),
      search: z.string().optional().describe("Case-insensitive match on title and content"),
      order_by: z.enum(["publishedAt", "createdAt"]).optional().describe("Sort key (default publishedAt)"),
      direction: z.enum(["asc", "desc"]).optional().describe("Sort direction (default desc)"),
      limit: z.number().int().min(1).max(200).optional().describe("Max items to return (default 50)"),
      offset: z.number().int().min(0).optional().describe("Items to skip"),
    },
    async (params) =>
      run(async () => {
        const page = await feedService.listItems({
          feedId: params.feed_id,
          isRead: params.unread_only ? false : undefined,
          search: params.search,
          orderBy: params.order_by,
          direction: params.direction,
          limit: params.limit,
          offset: params.offset,
        });
        return renderItems(page, params.offset ?? 0);
      }),
  );

  // ── mark_item_read / mark_feed_read / mark_items_read ─────────

  server.tool(
    "mark_item_read",
    "Mark one item read, or unread with read=false.",
    {
      item_id: z.string().describe("ID of the item"),
      read: z.boolean().optional().describe("Read state to set (default true)"),
    },
    async (params) =>
      run(async () => {
        const changed = await feedService.markItemRead(params.item_id, params.read ?? true);
        return `${changed} item(s) changed.`;
      }),
  );

  server.tool(
    "mark_feed_read",
    "Mark every item of a feed read.",
    { feed_id: z.string().describe("ID of the feed") },
    async (params) =>
      run(async () => `${await feedService.markAllRead(params.feed_id)} item(s) marked read.`),
  );

  server.tool(
    "mark_items_read",
    "Mark every unread item matching the filter read.",
    {
      feed_id: z.string().optional().describe("Only items of this feed"),
      search: z.string().optional().describe("Case-insensitive match on title and content"),
    },
    async (params) =>
      run(async () => {
        const changed = await feedService.markItemsRead({ feedId: params.feed_id, search: params.search });
        return `${changed} item(s) marked read.`;
      }),
  );

  // ── delete_feed ───────────────────────────────────────────────

  server.tool(
    "delete_feed",
    "Unsubscribe from a feed and delete its items.",
    { feed_id: z.string().describe("ID of the feed") },
    async (params) =>
      run(async () => {
        await feedService.deleteFeed(params.feed_id);
        return `Deleted feed ${params.feed_id}.`;
      }),
  );
}
