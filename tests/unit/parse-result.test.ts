import { describe, it, expect } from "vitest";
import { hasUsableContent, isMalformed, parseError } from "../../src/core/parse-result.js";
import type { ParseResult } from "../../src/core/types.js";

const clean: ParseResult = { title: "Blog", entries: [], outcome: { status: "clean" } };
const tolerated: ParseResult = {
  entries: [{ guid: "a" }],
  outcome: { status: "tolerated", diagnostic: "Unexpected close tag" },
};
const failed: ParseResult = {
  entries: [],
  outcome: { status: "failed", stage: "parse", reason: "no XML elements found" },
};

describe("parse result view", () => {
  it("flags everything but a clean parse as malformed", () => {
    expect(isMalformed(clean)).toBe(false);
    expect(isMalformed(tolerated)).toBe(true);
    expect(isMalformed(failed)).toBe(true);
  });

  it("exposes the diagnostic or failure reason", () => {
    expect(parseError(clean)).toBeUndefined();
    expect(parseError(tolerated)).toBe("Unexpected close tag");
    expect(parseError(failed)).toBe("no XML elements found");
  });

  it("counts a title or any entry as usable", () => {
    expect(hasUsableContent(clean)).toBe(true);
    expect(hasUsableContent(tolerated)).toBe(true);
    expect(hasUsableContent(failed)).toBe(false);
  });
});
