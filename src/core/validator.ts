import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { hasUsableContent, isMalformed, parseError } from "./parse-result.js";
import type { FeedSourceParser, ValidationResult } from "./types.js";

export const NOT_A_FEED = "not a recognizable feed";

const ALLOWED_SCHEMES = new Set(["http:", "https:"]);

export type UrlCheck = { ok: true; url: URL } | { ok: false; reason: string };

/** Syntax and scheme only; no I/O. */
export function checkFeedUrl(input: unknown): UrlCheck {
  if (typeof input !== "string" || !input.trim()) {
    return { ok: false, reason: "url is required" };
  }
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    return { ok: false, reason: `url is not a valid URL: ${input}` };
  }
  if (!ALLOWED_SCHEMES.has(url.protocol)) {
    return {
      ok: false,
      reason: `unsupported URL scheme "${url.protocol.replace(/:$/, "")}"; expected http or https`,
    };
  }
  if (!url.hostname) {
    return { ok: false, reason: "url has no host" };
  }
  return { ok: true, url };
}

/**
 * Answers "does this URL serve a feed?" with a fetch and a parse. Writes
 * nothing.
 */
export class FeedValidator {
  constructor(
    private readonly parser: FeedSourceParser,
    private readonly log: Logger = silentLogger,
  ) {}

  async validate(url: string, signal?: AbortSignal): Promise<ValidationResult> {
    const checked = checkFeedUrl(url);
    if (!checked.ok) {
      this.log.info("Rejected feed URL", { url, reason: checked.reason });
      return { ok: false, failure: "input", reason: checked.reason };
    }

    const result = await this.parser.parse({ url: checked.url.toString(), signal });
    const { outcome } = result;

    if (outcome.status === "failed") {
      if (outcome.stage === "transport") {
        return { ok: false, failure: "transport", reason: outcome.reason };
      }
      this.log.info("URL does not serve a feed", { url, reason: outcome.reason });
      return { ok: false, failure: "parse", reason: `${NOT_A_FEED}: ${outcome.reason}` };
    }

    if (!hasUsableContent(result)) {
      this.log.info("URL does not serve a feed", { url, reason: "no title and no entries" });
      return { ok: false, failure: "parse", reason: NOT_A_FEED };
    }

    if (isMalformed(result)) {
      this.log.warn("Feed has format problems but is usable", { url, diagnostic: parseError(result) });
    }
    this.log.info("Validated feed", { url, entries: result.entries.length });
    return { ok: true, title: result.title };
  }
}
