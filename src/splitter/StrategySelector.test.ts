import { describe, expect, it } from "vitest";
import { analyzeDocumentStructure, selectStrategy } from "./StrategySelector";

describe("selectStrategy", () => {
  it("should choose hierarchical for documents with three or more headings", () => {
    expect(selectStrategy("# A\n\nSome text.\n\n## B\n\n## C")).toBe("hierarchical");
  });

  it("should choose paragraph for numbered steps", () => {
    expect(selectStrategy("1. Intro\n2. Scope\n3. Terms\n4-1. Setup\n(5) Usage")).toBe(
      "paragraph",
    );
  });

  it("should choose paragraph for long narrative paragraphs", () => {
    expect(selectStrategy("word ".repeat(80))).toBe("paragraph");
  });

  it("should default to sentence", () => {
    expect(selectStrategy("Short text here. Another line.")).toBe("sentence");
  });
});

describe("analyzeDocumentStructure", () => {
  it("should average the length of paragraphs over 20 characters", () => {
    const analysis = analyzeDocumentStructure(
      "Para one is long enough.\n\nshort\n\nPara two is also long enough.",
    );

    expect(analysis).toEqual({
      headingCount: 0,
      numberedSectionCount: 0,
      paragraphCount: 2,
      averageParagraphLength: 26.5,
    });
  });

  it("should only inspect the first 10,000 characters", () => {
    const analysis = analyzeDocumentStructure(`${"x".repeat(10_000)}\n# A\n# B\n# C`);
    expect(analysis.headingCount).toBe(0);
  });
});
