#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { FeedParser } from "./adapters/feed-parser.js";
import { FetchTransport } from "./adapters/http-transport.js";
import { loadConfig } from "./config.js";
import { FeedService } from "./core/feed-service.js";
import { SyncCoordinator } from "./core/sync-coordinator.js";
import { FeedValidator } from "./core/validator.js";
import { closeDb } from "./db/index.js";
import { createLogger } from "./logger.js";
import { registerTools } from "./mcp/tools.js";
import { PgFeedStore } from "./stores/feed-store.js";
import { PgItemStore } from "./stores/item-store.js";

const config = loadConfig();
const log = createLogger({ minLevel: config.log.level, json: config.log.json });

// ── Stores ──────────────────────────────────────────────────────

const feedStore = new PgFeedStore();
const itemStore = new PgItemStore();

// ── Core services ───────────────────────────────────────────────

const parser = new FeedParser(new FetchTransport(config.fetch), log.child({ component: "parser" }));
const validator = new FeedValidator(parser, log.child({ component: "validator" }));
const syncCoordinator = new SyncCoordinator(parser, feedStore, itemStore, {
  concurrency: config.syncConcurrency,
  log: log.child({ component: "sync" }),
});
const feedService = new FeedService(feedStore, itemStore, validator, syncCoordinator, log);

// ── MCP server ──────────────────────────────────────────────────

const server = new McpServer({
  name: "feed-ingest",
  version: "1.0.0",
});

registerTools(server, feedService);

// ── Start ───────────────────────────────────────────────────────

async function shutdown(signal: string) {
  log.info("Shutting down", { signal });
  await server.close();
  await closeDb();
  process.exit(0);
}

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server ready on stdio");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error("Shutdown failed", { error: String(err) });
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
