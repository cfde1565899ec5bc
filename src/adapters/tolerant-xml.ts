/**
 * Lenient RSS/Atom reader for documents the strict parser rejects.
 *
 * fast-xml-parser does not validate, so unescaped ampersands, HTML entities,
 * mismatched closing tags and the like still produce a tree. We then pick out
 * what we can from an rss, rdf:RDF or feed root.
 */

import { XMLParser } from "fast-xml-parser";
import type { RawEntry } from "../core/types.js";
import { contentList, textOf, toRawEntry } from "./raw-entry.js";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: true,
  isArray: (name) => name === "item" || name === "entry",
});

export type TolerantParse =
  | { ok: true; title?: string; entries: RawEntry[] }
  | { ok: false; reason: string };

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstNode(value: unknown): XmlNode | undefined {
  if (Array.isArray(value)) return value.find(isNode);
  return isNode(value) ? value : undefined;
}

function nodes(value: unknown): XmlNode[] {
  if (Array.isArray(value)) return value.filter(isNode);
  return isNode(value) ? [value] : [];
}

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function atomLink(value: unknown): string | undefined {
  const links = Array.isArray(value) ? value : [value];
  let fallback: string | undefined;
  for (const link of links) {
    if (typeof link === "string") {
      fallback ??= clean(link);
      continue;
    }
    if (!isNode(link)) continue;
    const href = clean(textOf(link["@_href"]));
    const rel = textOf(link["@_rel"]);
    if (href && (rel === undefined || rel === "alternate")) return href;
    fallback ??= href;
  }
  return fallback;
}

function rssEntry(item: XmlNode): RawEntry {
  const encoded = textOf(item["content:encoded"]);
  return toRawEntry({
    guid: clean(textOf(item.guid)),
    link: clean(textOf(item.link)),
    title: textOf(item.title) ?? textOf(item["dc:title"]),
    author: clean(textOf(item["dc:creator"]) ?? textOf(item.author)),
    content: contentList(encoded, "text/html"),
    description: textOf(item.description),
    published: clean(textOf(item.pubDate) ?? textOf(item["dc:date"])),
  });
}

function atomEntry(entry: XmlNode): RawEntry {
  const content = entry.content;
  const contentType = isNode(content) ? textOf(content["@_type"]) : undefined;
  const author = firstNode(entry.author);
  return toRawEntry({
    id: clean(textOf(entry.id)),
    link: atomLink(entry.link),
    title: textOf(entry.title),
    author: clean(author ? textOf(author.name) : undefined),
    content: contentList(textOf(content), contentType),
    summary: textOf(entry.summary),
    published: clean(textOf(entry.published) ?? textOf(entry.issued)),
    updated: clean(textOf(entry.updated) ?? textOf(entry.modified)),
    created: clean(textOf(entry.created)),
  });
}

export function parseTolerant(xml: string): TolerantParse {
  let doc: unknown;
  try {
    doc = xmlParser.parse(xml);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  if (!isNode(doc)) return { ok: false, reason: "no XML elements found" };

  const rss = firstNode(doc.rss);
  if (rss) {
    const channel = firstNode(rss.channel);
    if (!channel) return { ok: false, reason: "<rss> has no <channel>" };
    return {
      ok: true,
      title: clean(textOf(channel.title)),
      entries: nodes(channel.item).map(rssEntry),
    };
  }

  const rdf = firstNode(doc["rdf:RDF"]);
  if (rdf) {
    const channel = firstNode(rdf.channel);
    return {
      ok: true,
      title: clean(textOf(channel?.title)),
      entries: nodes(rdf.item ?? channel?.item).map(rssEntry),
    };
  }

  const feed = firstNode(doc.feed);
  if (feed) {
    return {
      ok: true,
      title: clean(textOf(feed.title)),
      entries: nodes(feed.entry).map(atomEntry),
    };
  }

  const root = Object.keys(doc).find((key) => !key.startsWith("?") && !key.startsWith("@_"));
  return {
    ok: false,
    reason: root ? `unsupported root element <${root}>` : "no XML elements found",
  };
}
