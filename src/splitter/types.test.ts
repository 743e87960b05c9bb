import { describe, expect, it } from "vitest";
import { chunkOptionsSchema, parseChunkingStrategy } from "./types";

describe("parseChunkingStrategy", () => {
  it.each([
    ["Sentence", "sentence"],
    [" PARAGRAPH ", "paragraph"],
    ["hierarchical", "hierarchical"],
    ["Smart", "sentence"],
    ["Intelligent", "semantic"],
    ["Fixed_Size", "token"],
    ["fixed-size", "token"],
    ["PageLevel", "paragraph"],
    ["unknown", "auto"],
    [undefined, "auto"],
  ])("should resolve %s to %s", (name, expected) => {
    expect(parseChunkingStrategy(name)).toBe(expected);
  });
});

describe("chunkOptionsSchema", () => {
  it("should fill in the defaults", () => {
    expect(chunkOptionsSchema.parse({})).toEqual({
      strategy: "auto",
      maxChunkSize: 1024,
      minChunkSize: 200,
      overlapSize: 128,
      targetChunkSize: 512,
      preserveParagraphs: true,
      preserveSentences: true,
    });
  });

  it("should cap sizes that exceed a small maximum", () => {
    expect(chunkOptionsSchema.parse({ maxChunkSize: 100 })).toMatchObject({
      maxChunkSize: 100,
      minChunkSize: 100,
      targetChunkSize: 100,
      overlapSize: 50,
    });
  });

  it("should reject a non-positive maximum", () => {
    expect(chunkOptionsSchema.safeParse({ maxChunkSize: 0 }).success).toBe(false);
  });
});
