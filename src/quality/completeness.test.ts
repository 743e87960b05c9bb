import { describe, expect, it } from "vitest";
import { assessChunkCompleteness } from "./completeness";

describe("assessChunkCompleteness", () => {
  it("scores three of four factors for a short, clean paragraph", () => {
    const score = assessChunkCompleteness(
      "This is sentence one. This is sentence two. This is sentence three.",
    );
    // content, terminal period, capital start; too short for the length factor
    expect(score).toBeCloseTo(0.8, 10);
  });

  it("scores all factors for a well-formed paragraph of moderate length", () => {
    const content = "Retrieval works best with complete context. ".repeat(3);
    expect(assessChunkCompleteness(content)).toBeCloseTo(1, 10);
  });

  it("scores only the content factor for a lowercase fragment", () => {
    expect(assessChunkCompleteness("lowercase fragment")).toBe(0.5);
  });

  it("scores blank content as 0", () => {
    expect(assessChunkCompleteness("")).toBe(0);
    expect(assessChunkCompleteness("  \n ")).toBe(0);
  });
});
