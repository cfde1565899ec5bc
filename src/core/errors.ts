import type { TransportErrorKind, ValidationFailure } from "./types.js";

/** Malformed URL or disallowed scheme; raised before any I/O. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/**
 * Fetch failed before a usable body arrived. The message always starts with
 * the kind, so callers can surface it verbatim.
 */
export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    detail: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(`${kind}: ${detail}`);
    this.name = "TransportError";
  }
}

/** A (feedId, guid) pair that is already stored. */
export class DuplicateItemError extends Error {
  constructor(
    public readonly feedId: string,
    public readonly guid: string,
  ) {
    super(`Item already exists for feed ${feedId}: ${guid}`);
    this.name = "DuplicateItemError";
  }
}

export class DuplicateFeedError extends Error {
  constructor(public readonly url: string) {
    super(`Feed already exists: ${url}`);
    this.name = "DuplicateFeedError";
  }
}

export class FeedNotFoundError extends Error {
  constructor(public readonly feedId: string) {
    super(`Feed not found: ${feedId}`);
    this.name = "FeedNotFoundError";
  }
}

export class FeedRejectedError extends Error {
  constructor(
    public readonly url: string,
    public readonly failure: ValidationFailure,
    public readonly reason: string,
  ) {
    super(`Feed validation failed: ${reason}`);
    this.name = "FeedRejectedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
