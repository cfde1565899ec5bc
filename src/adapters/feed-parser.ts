import RssParser from "rss-parser";
import { TransportError, errorMessage } from "../core/errors.js";
import type { FeedSource, FeedSourceParser, ParseResult, RawEntry } from "../core/types.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { HttpTransport } from "./http-transport.js";
import { contentList, textOf, toRawEntry } from "./raw-entry.js";
import { parseTolerant } from "./tolerant-xml.js";

interface ItemExtras {
  id?: unknown;
  author?: unknown;
  description?: unknown;
  published?: unknown;
  updated?: unknown;
  created?: unknown;
  "dc:date"?: unknown;
  "dc:creator"?: unknown;
  "content:encoded"?: unknown;
}

type StrictItem = RssParser.Item & ItemExtras;

// rss-parser sits on xml2js in strict mode: a document it accepts is
// well-formed, anything else falls through to the tolerant reader.
const strictParser = new RssParser<Record<string, unknown>, ItemExtras>({
  customFields: {
    item: ["id", "description", "published", "updated", "created", "dc:date", "dc:creator"],
  },
});

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function rootElement(xml: string): string | undefined {
  const stripped = xml.replace(/<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>[]*(\[[\s\S]*?\])?\s*>/gi, "");
  return /<([A-Za-z_][\w:.-]*)/.exec(stripped)?.[1];
}

function fromRssItem(item: StrictItem): RawEntry {
  return toRawEntry({
    guid: clean(textOf(item.guid)),
    link: clean(textOf(item.link)),
    title: textOf(item.title),
    author: clean(textOf(item["dc:creator"]) ?? textOf(item.creator)),
    content: contentList(textOf(item["content:encoded"]), "text/html"),
    description: textOf(item.description),
    published: clean(textOf(item.pubDate) ?? textOf(item["dc:date"])),
  });
}

function fromAtomEntry(item: StrictItem): RawEntry {
  return toRawEntry({
    id: clean(textOf(item.id)),
    link: clean(textOf(item.link)),
    title: textOf(item.title),
    author: clean(textOf(item.author)),
    content: contentList(textOf(item.content)),
    summary: textOf(item.summary),
    published: clean(textOf(item.published)),
    updated: clean(textOf(item.updated)),
    created: clean(textOf(item.created)),
  });
}

// ── Body decoding ─────────────────────────────────────────────────

function bomEncoding(bytes: Uint8Array): string | undefined {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return "utf-8";
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return "utf-16be";
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return "utf-16le";
  return undefined;
}

function charsetOf(contentType: string | undefined): string | undefined {
  return contentType ? /charset\s*=\s*"?([\w.:-]+)"?/i.exec(contentType)?.[1] : undefined;
}

function prologEncoding(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  return /^\s*<\?xml[^>]*encoding\s*=\s*["']([\w.:-]+)["']/i.exec(head)?.[1];
}

export function decodeBody(body: Uint8Array | string, contentType?: string): string {
  if (typeof body === "string") return body.replace(/^\uFEFF/, "");
  const label = bomEncoding(body) ?? charsetOf(contentType) ?? prologEncoding(body) ?? "utf-8";
  try {
    return new TextDecoder(label).decode(body);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    return new TextDecoder("utf-8").decode(body);
  }
}

// ── Parser ────────────────────────────────────────────────────────

export class FeedParser implements FeedSourceParser {
  constructor(
    private readonly transport: HttpTransport,
    private readonly log: Logger = silentLogger,
  ) {}

  async parse(source: FeedSource): Promise<ParseResult> {
    if ("body" in source) return this.parseBody(source.body, source.contentType);

    try {
      const res = await this.transport.get(source.url, source.signal);
      return await this.parseBody(res.body, res.headers.get("content-type") ?? undefined);
    } catch (err) {
      if (err instanceof TransportError) {
        this.log.warn("Feed fetch failed", { url: source.url, kind: err.kind, status: err.status });
        return {
          entries: [],
          outcome: { status: "failed", stage: "transport", kind: err.kind, reason: err.message },
        };
      }
      const reason = errorMessage(err);
      this.log.error("Unexpected feed parse error", { url: source.url, error: reason });
      return { entries: [], outcome: { status: "failed", stage: "parse", reason } };
    }
  }

  async parseBody(body: Uint8Array | string, contentType?: string): Promise<ParseResult> {
    const xml = decodeBody(body, contentType);
    if (!xml.trim()) {
      return { entries: [], outcome: { status: "failed", stage: "parse", reason: "empty document" } };
    }

    let strictError = "strict parse failed";
    try {
      const feed = await strictParser.parseString(xml);
      const atom = rootElement(xml) === "feed";
      return {
        title: clean(textOf(feed.title)),
        entries: feed.items.map(atom ? fromAtomEntry : fromRssItem),
        outcome: { status: "clean" },
      };
    } catch (err) {
      strictError = errorMessage(err).replace(/\s+/g, " ").trim();
    }

    const tolerant = parseTolerant(xml);
    if (!tolerant.ok) {
      return { entries: [], outcome: { status: "failed", stage: "parse", reason: tolerant.reason } };
    }
    this.log.debug("Feed parsed in tolerant mode", { diagnostic: strictError });
    return {
      title: tolerant.title,
      entries: tolerant.entries,
      outcome: { status: "tolerated", diagnostic: strictError },
    };
  }
}
