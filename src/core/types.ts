// ── Feed: a subscribed remote source ──────────────────────────────

export interface Feed {
  id: string;
  url: string;
  title: string | null;
  lastFetchedAt: Date | null;
  addedAt: Date;
}

// ── FeedItem: one ingested entry, unique per (feedId, guid) ───────

export interface FeedItem {
  id: string;
  feedId: string;
  guid: string;
  title: string;
  content: string;
  publishedAt: Date;
  isRead: boolean;
  createdAt: Date;
}

export type NewFeedItem = Omit<FeedItem, "id" | "isRead" | "createdAt">;

// ── Raw entries as the parser hands them over ─────────────────────

export interface ContentPart {
  value: string;
  type?: string;
}

/**
 * Uniform key/value view of one parsed entry. Well-known keys: id, guid,
 * link, title, author, content (ContentPart[]), summary, description,
 * published / updated / created (raw strings) and their *Parsed Date forms.
 */
export type RawEntry = Readonly<Record<string, unknown>>;

export interface ExtractedItem {
  guid?: string;
  title: string;
  content: string;
  publishedAt?: Date;
}

// ── Parse outcome ─────────────────────────────────────────────────

export type TransportErrorKind =
  | "timeout"
  | "connection-error"
  | "too-many-redirects"
  | "http-error";

export type ParseOutcome =
  | { status: "clean" }
  | { status: "tolerated"; diagnostic: string }
  | { status: "failed"; stage: "transport"; kind: TransportErrorKind; reason: string }
  | { status: "failed"; stage: "parse"; reason: string };

export interface ParseResult {
  title?: string;
  entries: RawEntry[];
  outcome: ParseOutcome;
}

export type FeedSource = { url: string; signal?: AbortSignal } | { body: Uint8Array | string; contentType?: string };

export interface FeedSourceParser {
  parse(source: FeedSource): Promise<ParseResult>;
}

// ── Validation ────────────────────────────────────────────────────

export type ValidationFailure = "input" | "transport" | "parse";

export type ValidationResult =
  | { ok: true; title?: string }
  | { ok: false; failure: ValidationFailure; reason: string };

// ── Sync ──────────────────────────────────────────────────────────

export type SyncPhase =
  | "fetching"
  | "parsed"
  | "extracting"
  | "deduping"
  | "persisting"
  | "done"
  | "failed";

export type SkipReason =
  | "missing-guid"
  | "already-stored"
  | "duplicate-in-batch"
  | "extraction-failed"
  | "persist-conflict"
  | "persist-failed";

export interface SkippedEntry {
  index: number;
  guid?: string;
  reason: SkipReason;
  detail?: string;
}

export interface SyncOutcome {
  feedId: string;
  state: "done" | "failed";
  created: number;
  error?: string;
  skipped: SkippedEntry[];
}

// ── Query types ───────────────────────────────────────────────────

export interface ItemFilter {
  feedId?: string;
  isRead?: boolean;
  /** Case-insensitive match against title and content. */
  search?: string;
}

export interface ItemQuery extends ItemFilter {
  orderBy?: "publishedAt" | "createdAt";
  direction?: "asc" | "desc";
  limit?: number;
  offset?: number;
}
