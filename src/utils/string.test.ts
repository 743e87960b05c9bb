import { describe, expect, it } from "vitest";
import { countMatches, normalizeLineEndings, truncate } from "./string";

describe("string utils", () => {
  it("normalizes CRLF and lone CR line endings", () => {
    expect(normalizeLineEndings("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });

  it("leaves short text untouched", () => {
    expect(truncate("short text", 20)).toBe("short text");
  });

  it("truncates at a word boundary", () => {
    expect(truncate("the quick brown fox jumps", 12)).toBe("the quick…");
  });

  it("cuts inside a word when no boundary is close enough", () => {
    expect(truncate("abcdefghijkl", 6)).toBe("abcde…");
  });

  it("counts matches with or without the global flag", () => {
    expect(countMatches("a1 b2 c3", /\d/)).toBe(3);
    expect(countMatches("a1 b2 c3", /\d/g)).toBe(3);
    expect(countMatches("abc", /\d/g)).toBe(0);
  });
});
