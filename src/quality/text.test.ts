import { describe, expect, it } from "vitest";
import {
  clampScore,
  extractTerms,
  getOverlapLength,
  isCompleteSentence,
  isCompleteThought,
  splitIntoSentences,
  termSimilarity,
  topTerms,
} from "./text";

describe("text heuristics", () => {
  describe("splitIntoSentences", () => {
    it("splits only where terminal punctuation is followed by a capital", () => {
      expect(splitIntoSentences("This is one. This is two! ok? Fine.")).toEqual([
        "This is one.",
        "This is two! ok?",
        "Fine.",
      ]);
    });

    it("returns nothing for blank text", () => {
      expect(splitIntoSentences("   ")).toEqual([]);
    });
  });

  describe("extractTerms", () => {
    it("lowercases, splits on punctuation and drops short and stop words", () => {
      expect(extractTerms("The Quick, quick (brown) fox's den!")).toEqual([
        "quick",
        "quick",
        "brown",
        "fox",
        "den",
      ]);
    });
  });

  describe("getOverlapLength", () => {
    it("finds the shared suffix and prefix", () => {
      expect(getOverlapLength("...the quick brown fox.", "brown fox. jumps over")).toBe(10);
    });

    it("ignores overlaps below the minimum length", () => {
      expect(getOverlapLength("...the quick brown fox.", "brown fox. jumps over", 256, 21)).toBe(0);
    });

    it("returns 0 when nothing is shared", () => {
      expect(getOverlapLength("abc", "xyz")).toBe(0);
    });

    it("never scans past the maximum length", () => {
      const shared = "x".repeat(30);
      expect(getOverlapLength(shared, shared, 20)).toBe(20);
    });
  });

  describe("sentence tests", () => {
    it("requires more than ten characters and a terminal mark", () => {
      expect(isCompleteSentence("Short one.")).toBe(false);
      expect(isCompleteSentence("A longer sentence:")).toBe(true);
      expect(isCompleteSentence("No punctuation at the end")).toBe(false);
    });

    it("requires two complete sentences in over 100 characters for a complete thought", () => {
      const thought =
        "Retrieval works best with complete context. Each chunk should stand on its own. Short fragments lose meaning.";
      expect(isCompleteThought(thought)).toBe(true);
      expect(isCompleteThought("One sentence. Two sentences.")).toBe(false);
    });
  });

  it("measures term similarity as a Jaccard index", () => {
    // {alpha, beta, gamma} vs {beta, gamma, delta}: 2 shared of 4
    expect(termSimilarity("alpha beta gamma", "beta gamma delta")).toBe(0.5);
    expect(termSimilarity("", "alpha")).toBe(0);
  });

  it("ranks terms by frequency, ties by first appearance", () => {
    expect(topTerms("alpha beta alpha gamma beta alpha", 2)).toEqual(["alpha", "beta"]);
    expect(topTerms("gamma delta", 5)).toEqual(["gamma", "delta"]);
  });

  it("clamps scores into the unit interval", () => {
    expect(clampScore(Number.NaN)).toBe(0);
    expect(clampScore(1.5)).toBe(1);
    expect(clampScore(-0.2)).toBe(0);
    expect(clampScore(0.4)).toBe(0.4);
  });
});
