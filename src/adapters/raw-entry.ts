import { parseStructuredDate } from "../core/dates.js";
import type { ContentPart, RawEntry } from "../core/types.js";

export interface RawEntryFields {
  id?: string;
  guid?: string;
  link?: string;
  title?: string;
  author?: string;
  content?: ContentPart[];
  summary?: string;
  description?: string;
  published?: string;
  updated?: string;
  created?: string;
}

const DATE_FIELDS = ["published", "updated", "created"] as const;

/**
 * Drops absent fields and adds publishedParsed / updatedParsed / createdParsed
 * for the raw dates that are in a standard format.
 */
export function toRawEntry(fields: RawEntryFields): RawEntry {
  const entry: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (Array.isArray(value) && value.length === 0) continue;
    entry[key] = value;
  }
  for (const field of DATE_FIELDS) {
    const parsed = parseStructuredDate(fields[field]);
    if (parsed) entry[`${field}Parsed`] = parsed;
  }
  return entry;
}

/**
 * Text of an XML node as either parser represents it: a plain string, an
 * xml2js `{ _: text }` node, a fast-xml-parser `{ "#text": text }` node, or
 * the first element of a repeated node.
 */
export function textOf(node: unknown): string | undefined {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (Array.isArray(node)) return node.length > 0 ? textOf(node[0]) : undefined;
  if (typeof node === "object" && node !== null) {
    if ("_" in node) return textOf(node._);
    if ("#text" in node) return textOf(node["#text"]);
  }
  return undefined;
}

export function contentList(value: string | undefined, type?: string): ContentPart[] | undefined {
  if (value === undefined) return undefined;
  return [type ? { value, type } : { value }];
}
