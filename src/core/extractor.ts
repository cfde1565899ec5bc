import { isValidDate, parseLooseDate } from "./dates.js";
import type { ExtractedItem, RawEntry } from "./types.js";

export const UNTITLED = "Untitled";

// Each list is tried in order; the first usable value wins.
const GUID_FIELDS = ["id", "guid", "link"] as const;
const CONTENT_TEXT_FIELDS = ["summary", "description"] as const;
const STRUCTURED_DATE_FIELDS = ["publishedParsed", "updatedParsed", "createdParsed"] as const;
const STRING_DATE_FIELDS = ["published", "updated", "created"] as const;

function text(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function firstNonEmpty(entry: RawEntry, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = text(entry[field])?.trim();
    if (value) return value;
  }
  return undefined;
}

function firstContentValue(value: unknown): string | undefined {
  if (!Array.isArray(value) || value.length === 0) return undefined;
  const first: unknown = value[0];
  if (typeof first === "string") return first;
  if (typeof first === "object" && first !== null && "value" in first) {
    return text(first.value);
  }
  return undefined;
}

export function extractGuid(entry: RawEntry): string | undefined {
  return firstNonEmpty(entry, GUID_FIELDS);
}

export function extractContent(entry: RawEntry): string {
  const structured = firstContentValue(entry.content);
  if (structured !== undefined) return structured;
  for (const field of CONTENT_TEXT_FIELDS) {
    const value = text(entry[field]);
    if (value !== undefined) return value;
  }
  return "";
}

export function extractPublishedAt(entry: RawEntry): Date | undefined {
  for (const field of STRUCTURED_DATE_FIELDS) {
    const value = entry[field];
    if (isValidDate(value)) return value;
  }
  for (const field of STRING_DATE_FIELDS) {
    const parsed = parseLooseDate(entry[field]);
    if (parsed) return parsed;
  }
  return undefined;
}

/** Best-effort normalization of one entry. No I/O. */
export function extract(entry: RawEntry): ExtractedItem {
  const title = text(entry.title)?.trim();
  return {
    guid: extractGuid(entry),
    title: title ? title : UNTITLED,
    content: extractContent(entry),
    publishedAt: extractPublishedAt(entry),
  };
}
