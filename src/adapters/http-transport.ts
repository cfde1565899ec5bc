/**
 * HTTP GET for feed documents.
 *
 * Redirects are followed by hand so the hop count can be enforced; the
 * timeout covers the whole chain including the body read. Every failure comes
 * out as a TransportError with one of four kinds.
 */

import { DEFAULT_FETCH_CONFIG, type FetchConfig } from "../config.js";
import { TransportError, errorMessage } from "../core/errors.js";

const ACCEPT = "application/rss+xml, application/atom+xml, application/rdf+xml, application/xml, text/xml;q=0.9, */*;q=0.8";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpResponse {
  /** Final URL after redirects. */
  url: string;
  status: number;
  headers: Headers;
  body: Uint8Array;
}

export interface HttpTransport {
  get(url: string, signal?: AbortSignal): Promise<HttpResponse>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export class FetchTransport implements HttpTransport {
  readonly config: FetchConfig;

  constructor(
    config: Partial<FetchConfig> = {},
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.config = { ...DEFAULT_FETCH_CONFIG, ...config };
  }

  async get(url: string, signal?: AbortSignal): Promise<HttpResponse> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([timeout, signal]) : timeout;
    const fail = (err: unknown, at: string): TransportError => {
      if (timeout.aborted) {
        return new TransportError("timeout", `no complete response within ${this.config.timeoutMs}ms`, at);
      }
      if (signal?.aborted) {
        return new TransportError("connection-error", "request aborted by caller", at);
      }
      return new TransportError("connection-error", describeCause(err), at);
    };

    let current = url;
    for (let hops = 0; ; hops++) {
      let res: Response;
      try {
        res = await this.fetchImpl(current, {
          method: "GET",
          redirect: "manual",
          signal: combined,
          headers: {
            "User-Agent": this.config.userAgent,
            Accept: ACCEPT,
          },
        });
      } catch (err) {
        throw fail(err, current);
      }

      if (REDIRECT_STATUSES.has(res.status)) {
        const location = res.headers.get("location");
        await discardBody(res);
        if (!location) {
          throw new TransportError("http-error", `HTTP ${res.status} without Location header`, current, res.status);
        }
        if (hops >= this.config.maxRedirects) {
          throw new TransportError(
            "too-many-redirects",
            `more than ${this.config.maxRedirects} redirects`,
            url,
          );
        }
        let next: URL;
        try {
          next = new URL(location, current);
        } catch {
          throw new TransportError("http-error", "invalid Location header", current, res.status);
        }
        current = next.toString();
        continue;
      }

      if (res.status < 200 || res.status > 299) {
        await discardBody(res);
        throw new TransportError("http-error", `HTTP ${res.status}`, current, res.status);
      }

      try {
        const body = new Uint8Array(await res.arrayBuffer());
        return { url: current, status: res.status, headers: res.headers, body };
      } catch (err) {
        throw fail(err, current);
      }
    }
  }
}

async function discardBody(res: Response): Promise<void> {
  if (res.body && !res.bodyUsed) await res.body.cancel();
}

// undici reports network failures as TypeError("fetch failed") with the
// useful part in `cause`.
function describeCause(err: unknown): string {
  if (err instanceof Error && err.cause !== undefined) {
    const cause = err.cause;
    if (cause instanceof Error) {
      const code = "code" in cause && typeof cause.code === "string" ? `${cause.code} ` : "";
      return `${code}${cause.message}`.trim();
    }
  }
  return errorMessage(err);
}
