/**
 * Unit tests for the fetch-based transport. A stub fetch stands in for the
 * network.
 */

import { describe, it, expect, vi } from "vitest";
import { FetchTransport, type FetchLike } from "../../src/adapters/http-transport.js";
import { TransportError } from "../../src/core/errors.js";

const FEED_URL = "https://example.com/feed.xml";

async function captureError(promise: Promise<unknown>): Promise<TransportError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof TransportError) return err;
    throw err;
  }
  throw new Error("expected a TransportError");
}

describe("FetchTransport", () => {
  it("returns the body bytes of a 2xx response", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("<rss/>", { status: 200 }));
    const transport = new FetchTransport({}, fetchImpl);

    const res = await transport.get(FEED_URL);

    expect(res.status).toBe(200);
    expect(res.url).toBe(FEED_URL);
    expect(new TextDecoder().decode(res.body)).toBe("<rss/>");
  });

  it("sends the configured user agent and a feed Accept header", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("ok"));
    const transport = new FetchTransport({ userAgent: "TestAgent/1" }, fetchImpl);

    await transport.get(FEED_URL);

    const init = fetchImpl.mock.calls[0][1];
    expect(init.redirect).toBe("manual");
    expect(init.headers).toMatchObject({ "User-Agent": "TestAgent/1" });
    expect(init.headers).toHaveProperty("Accept");
  });

  it("follows relative redirects", async () => {
    const fetchImpl = vi.fn<FetchLike>(async (input) =>
      input === FEED_URL
        ? new Response(null, { status: 302, headers: { location: "/moved.xml" } })
        : new Response("moved"),
    );
    const transport = new FetchTransport({}, fetchImpl);

    const res = await transport.get(FEED_URL);

    expect(res.url).toBe("https://example.com/moved.xml");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("gives up after the redirect limit", async () => {
    const fetchImpl = vi.fn<FetchLike>(
      async () => new Response(null, { status: 301, headers: { location: "/again" } }),
    );
    const transport = new FetchTransport({ maxRedirects: 2 }, fetchImpl);

    const err = await captureError(transport.get(FEED_URL));

    expect(err.kind).toBe("too-many-redirects");
    expect(err.message).toBe("too-many-redirects: more than 2 redirects");
    expect(err.url).toBe(FEED_URL);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("treats a redirect without Location as an HTTP error", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(null, { status: 301 }));
    const err = await captureError(new FetchTransport({}, fetchImpl).get(FEED_URL));

    expect(err.kind).toBe("http-error");
    expect(err.message).toBe("http-error: HTTP 301 without Location header");
  });

  it("treats an unparseable Location as an HTTP error", async () => {
    const fetchImpl = vi.fn<FetchLike>(
      async () => new Response(null, { status: 302, headers: { location: "http://[::1" } }),
    );
    const err = await captureError(new FetchTransport({}, fetchImpl).get(FEED_URL));

    expect(err.kind).toBe("http-error");
    expect(err.status).toBe(302);
    expect(err.message).toBe("http-error: invalid Location header");
  });

  it("reports non-2xx statuses", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("missing", { status: 404 }));
    const err = await captureError(new FetchTransport({}, fetchImpl).get(FEED_URL));

    expect(err.kind).toBe("http-error");
    expect(err.status).toBe(404);
    expect(err.message).toBe("http-error: HTTP 404");
  });

  it("reports network failures with the underlying cause", async () => {
    const cause = Object.assign(new Error("getaddrinfo ENOTFOUND example.invalid"), { code: "ENOTFOUND" });
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError("fetch failed", { cause });
    });
    const err = await captureError(new FetchTransport({}, fetchImpl).get(FEED_URL));

    expect(err.kind).toBe("connection-error");
    expect(err.message).toBe("connection-error: ENOTFOUND getaddrinfo ENOTFOUND example.invalid");
  });

  it("times out a request that never answers", async () => {
    const fetchImpl = vi.fn<FetchLike>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const err = await captureError(new FetchTransport({ timeoutMs: 20 }, fetchImpl).get(FEED_URL));

    expect(err.kind).toBe("timeout");
    expect(err.message).toBe("timeout: no complete response within 20ms");
  });

  it("distinguishes a caller abort from a timeout", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchImpl = vi.fn<FetchLike>(async (_input, init) => {
      if (init.signal?.aborted) throw new Error("aborted");
      return new Response("late");
    });
    const err = await captureError(new FetchTransport({}, fetchImpl).get(FEED_URL, controller.signal));

    expect(err.kind).toBe("connection-error");
    expect(err.message).toBe("connection-error: request aborted by caller");
  });
});
