import type { ParseResult } from "./types.js";

/** Anything other than a clean strict parse. */
export function isMalformed(result: ParseResult): boolean {
  return result.outcome.status !== "clean";
}

/** A feed title or at least one entry: enough to count as a feed. */
export function hasUsableContent(result: ParseResult): boolean {
  return Boolean(result.title) || result.entries.length > 0;
}

/** The failure reason, or the tolerated-parse diagnostic. */
export function parseError(result: ParseResult): string | undefined {
  switch (result.outcome.status) {
    case "clean":
      return undefined;
    case "tolerated":
      return result.outcome.diagnostic;
    case "failed":
      return result.outcome.reason;
  }
}
