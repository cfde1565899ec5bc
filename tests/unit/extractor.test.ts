/**
 * Unit tests for the field extractor.
 */

import { describe, it, expect } from "vitest";
import {
  UNTITLED,
  extract,
  extractContent,
  extractGuid,
  extractPublishedAt,
} from "../../src/core/extractor.js";

describe("extractGuid", () => {
  it("prefers id, then guid, then link", () => {
    expect(extractGuid({ id: "a", guid: "b", link: "c" })).toBe("a");
    expect(extractGuid({ guid: "b", link: "c" })).toBe("b");
    expect(extractGuid({ link: "c" })).toBe("c");
  });

  it("skips blank candidates", () => {
    expect(extractGuid({ id: "  ", guid: "b" })).toBe("b");
  });

  it("stringifies numeric ids", () => {
    expect(extractGuid({ id: 42 })).toBe("42");
  });

  it("returns undefined when no candidate is present", () => {
    expect(extractGuid({ title: "No identity" })).toBeUndefined();
  });
});

describe("extractContent", () => {
  it("takes the first structured content value", () => {
    expect(
      extractContent({
        content: [{ value: "<p>Full</p>", type: "text/html" }, { value: "second" }],
        summary: "Summary",
      }),
    ).toBe("<p>Full</p>");
  });

  it("falls back to summary, then description", () => {
    expect(extractContent({ content: [], summary: "Summary", description: "Desc" })).toBe("Summary");
    expect(extractContent({ description: "Desc" })).toBe("Desc");
  });

  it("uses a present but empty summary rather than the description", () => {
    expect(extractContent({ summary: "", description: "Desc" })).toBe("");
  });

  it("is empty when nothing is present", () => {
    expect(extractContent({})).toBe("");
  });
});

describe("extractPublishedAt", () => {
  const published = new Date(Date.UTC(2024, 0, 1));
  const updated = new Date(Date.UTC(2024, 0, 2));

  it("prefers the structured published date", () => {
    expect(extractPublishedAt({ publishedParsed: published, updatedParsed: updated })).toBe(published);
    expect(extractPublishedAt({ updatedParsed: updated, published: "2020-01-01" })).toBe(updated);
  });

  it("ignores invalid structured dates", () => {
    expect(
      extractPublishedAt({ publishedParsed: new Date(Number.NaN), published: "2024-01-03" }),
    ).toEqual(new Date(Date.UTC(2024, 0, 3)));
  });

  it("parses raw strings leniently in field order", () => {
    expect(
      extractPublishedAt({ published: "sometime last week", updated: "2024-01-02T00:00:00Z" }),
    ).toEqual(updated);
  });

  it("skips a raw date that only looks numeric", () => {
    expect(extractPublishedAt({ published: "Episode 3", updated: "January 5th, 2024" })).toEqual(
      new Date(Date.UTC(2024, 0, 5)),
    );
  });

  it("returns undefined when no date can be read", () => {
    expect(extractPublishedAt({ published: "soon" })).toBeUndefined();
    expect(extractPublishedAt({ published: "Episode 3" })).toBeUndefined();
    expect(extractPublishedAt({})).toBeUndefined();
  });
});

describe("extract", () => {
  it("normalizes a complete entry", () => {
    expect(
      extract({
        guid: "post-1",
        link: "https://example.com/1",
        title: "  Hello  ",
        author: "Ann",
        description: "Body",
        published: "Tue, 02 Jan 2024 10:00:00 GMT",
      }),
    ).toEqual({
      guid: "post-1",
      title: "Hello",
      content: "Body",
      publishedAt: new Date(Date.UTC(2024, 0, 2, 10)),
    });
  });

  it("fills a missing or blank title with the placeholder", () => {
    expect(extract({ id: "x" }).title).toBe(UNTITLED);
    expect(extract({ id: "x", title: "   " }).title).toBe("Untitled");
  });

  it("leaves guid and date absent rather than inventing them", () => {
    const item = extract({ title: "Orphan" });
    expect(item.guid).toBeUndefined();
    expect(item.publishedAt).toBeUndefined();
  });
});
