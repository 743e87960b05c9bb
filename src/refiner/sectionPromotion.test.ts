import { describe, expect, it } from "vitest";
import { promoteNumberedSections } from "./sectionPromotion";

describe("promoteNumberedSections", () => {
  it("should promote N-M. markers to level-3 headings", () => {
    expect(promoteNumberedSections("3-1. Technical Requirements")).toBe(
      "### 3-1. Technical Requirements",
    );
  });

  it("should promote N-M-K. markers to level-4 headings", () => {
    expect(promoteNumberedSections("2-1-4. Limits")).toBe("#### 2-1-4. Limits");
  });

  it("should promote a standalone N. title to a level-2 heading", () => {
    expect(promoteNumberedSections("1. Introduction\nSome text here.")).toBe(
      "## 1. Introduction\nSome text here.",
    );
  });

  it("should leave ordered lists alone", () => {
    const list = "1. apples\n2. pears\n3. plums";
    expect(promoteNumberedSections(list)).toBe(list);
  });

  it("should not promote numbered sentences", () => {
    const line = "1. This is a full sentence.";
    expect(promoteNumberedSections(line)).toBe(line);
  });

  it("should promote circled and parenthesised numerals to level 3", () => {
    expect(promoteNumberedSections("① Overview\n(2) Details")).toBe(
      "### ① Overview\n### (2) Details",
    );
  });

  it("should skip existing headings and fenced code", () => {
    const input = "## 1. Intro\n```\n3-1. not a heading\n```";
    expect(promoteNumberedSections(input)).toBe(input);
  });
});
