import { describe, expect, it, vi } from "vitest";
import { TextContentSplitter, findSentenceSpans, findWordSpans } from "./TextContentSplitter";

vi.mock("../../utils/logger");

describe("TextContentSplitter", () => {
  it("should split into sentences when sentences are preserved", async () => {
    const text = "First one. Second one!  Third";
    const splitter = new TextContentSplitter({ maxChunkSize: 100, preserveSentences: true });

    const spans = await splitter.split(text, { start: 0, end: text.length });

    expect(spans.map(({ start, end }) => text.slice(start, end))).toEqual([
      "First one.",
      "Second one!",
      "Third",
    ]);
  });

  it("should keep a short range whole when sentences need not be preserved", async () => {
    const splitter = new TextContentSplitter({ maxChunkSize: 50, preserveSentences: false });
    expect(await splitter.split("  hello world  ", { start: 0, end: 15 })).toEqual([
      { start: 2, end: 13 },
    ]);
  });

  it("should split long ranges into word runs within the size limit", async () => {
    const text = "one two three four five six seven eight nine ten";
    const splitter = new TextContentSplitter({ maxChunkSize: 12, preserveSentences: false });

    const spans = await splitter.split(text, { start: 0, end: text.length });
    const pieces = spans.map(({ start, end }) => text.slice(start, end));

    expect(pieces.length).toBeGreaterThan(1);
    for (const piece of pieces) {
      expect(piece.length).toBeLessThanOrEqual(12);
    }
    expect(pieces.join(" ")).toBe(text);
  });
});

describe("findSentenceSpans", () => {
  it("should keep closing quotes with their sentence", () => {
    const text = 'He said "Stop." Then left.';
    expect(findSentenceSpans(text, { start: 0, end: text.length })).toEqual([
      { start: 0, end: 15 },
      { start: 16, end: 26 },
    ]);
  });

  it("should offset spans by the start of the range", () => {
    const text = "# H\n\nOne. Two.";
    expect(findSentenceSpans(text, { start: 5, end: text.length })).toEqual([
      { start: 5, end: 9 },
      { start: 10, end: 14 },
    ]);
  });
});

describe("findWordSpans", () => {
  it("should find every word", () => {
    expect(findWordSpans("  ab cd", { start: 0, end: 7 })).toEqual([
      { start: 2, end: 4 },
      { start: 5, end: 7 },
    ]);
  });
});
