import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../utils/errors";
import { RagQualityAnalyzer } from "./RagQualityAnalyzer";
import type { AnalyzableChunk, RagQualityReport } from "./types";

vi.mock("../utils/logger");

const chunks = (...contents: string[]): AnalyzableChunk[] =>
  contents.map((content) => ({ content }));

const PARAGRAPH =
  "Retrieval works best with complete context. Each chunk should stand on its own. Short fragments lose meaning.";

const overallScores = (report: RagQualityReport): number[] => [
  report.compositeScore,
  report.semanticCompleteness.overallScore,
  report.contextPreservation.overallScore,
  report.informationDensity.overallScore,
  report.structuralIntegrity.overallScore,
  report.retrievalReadiness.overallScore,
  report.boundaryQuality.overallScore,
];

describe("RagQualityAnalyzer", () => {
  const analyzer = new RagQualityAnalyzer();

  it("reports zeros and a single recommendation for an empty chunk list", () => {
    const report = analyzer.analyze([]);

    expect(report.totalChunks).toBe(0);
    expect(overallScores(report)).toEqual([0, 0, 0, 0, 0, 0, 0]);
    expect(report.recommendations).toEqual([
      "No chunks were produced. Check that the document contains extractable text.",
    ]);
  });

  it("scores context preservation and boundary quality of a single chunk as 1", () => {
    const report = analyzer.analyze(chunks("lowercase fragment without an end"));

    expect(report.contextPreservation.overallScore).toBe(1);
    expect(report.boundaryQuality.overallScore).toBe(1);
  });

  it("scores a well-formed paragraph as semantically complete", () => {
    const report = analyzer.analyze(chunks(PARAGRAPH));

    expect(report.semanticCompleteness).toMatchObject({
      completeSentenceRatio: 1,
      completeThoughtRatio: 1,
      orphanedFragmentRatio: 0,
      averageBoundaryScore: 1,
    });
    expect(report.semanticCompleteness.overallScore).toBeCloseTo(1, 10);
  });

  it("detects an unmatched code fence as a broken structure", () => {
    const broken = analyzer.analyze(chunks("Intro text.\n```js\nconst a = 1;"));
    const closed = analyzer.analyze(chunks("Intro text.\n```js\nconst a = 1;\n```"));

    expect(broken.structuralIntegrity.brokenStructureRatio).toBe(1);
    expect(broken.structuralIntegrity.overallScore).toBe(0);
    expect(closed.structuralIntegrity.brokenStructureRatio).toBe(0);
    expect(closed.structuralIntegrity.overallScore).toBe(1);
  });

  it("detects a list reduced to a single item as a broken structure", () => {
    const report = analyzer.analyze(chunks("- only item"));
    expect(report.structuralIntegrity.brokenStructureRatio).toBe(1);
  });

  it("rewards overlap between adjacent chunks", () => {
    const report = analyzer.analyze(
      chunks(
        "Alpha beta gamma delta. The shared tail sentence is here.",
        "The shared tail sentence is here. More text follows now.",
      ),
    );
    const context = report.contextPreservation;

    expect(context.averageOverlapScore).toBe(1);
    expect(context.continuityScore).toBe(0.5);
    expect(context.referencePreservationScore).toBe(1);
    expect(context.contextWindowCoverage).toBe(0.5);
    expect(context.overallScore).toBeCloseTo(0.75, 10);
  });

  it("scores no overlap for unrelated chunks", () => {
    const report = analyzer.analyze(chunks("First chunk stands apart.", "Second one too."));
    expect(report.contextPreservation.averageOverlapScore).toBe(0);
  });

  it("lists recommendations in a fixed order", () => {
    const report = analyzer.analyze(chunks("tiny bit", "more bits"));

    expect(report.recommendations[0]).toBe(
      "High ratio of orphaned fragments detected. Consider increasing chunk size or improving boundary detection.",
    );
    expect(report.recommendations[1]).toBe(
      "Many chunks lack complete sentences. Adjust chunking strategy to preserve sentence boundaries.",
    );
    expect(report.recommendations[report.recommendations.length - 1]).toBe(
      "Overall quality below threshold. Consider using the 'Semantic' chunking strategy with appropriate parameters.",
    );
  });

  it("keeps every score within bounds", () => {
    const report = analyzer.analyze(
      chunks(
        "# Heading\n\nSome text that introduces the topic.",
        "",
        "   ",
        "| a | b |\n| --- | --- |\n| 1 | 2 |",
        "```\nunterminated",
        "It continues here, however briefly.",
      ),
      "# Heading\n\nSome text that introduces the topic.",
    );

    for (const score of overallScores(report)) {
      expect(Number.isNaN(score)).toBe(false);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
    expect(report.contentCoverage?.overallScore).toBeGreaterThanOrEqual(0);
    expect(report.contentCoverage?.overallScore).toBeLessThanOrEqual(1);
  });

  describe("content coverage", () => {
    it("is left out without the original text", () => {
      expect(analyzer.analyze(chunks(PARAGRAPH)).contentCoverage).toBeUndefined();
    });

    it("penalizes duplicated chunks", () => {
      const report = analyzer.analyze(
        chunks("Same text here.", "Same text here."),
        "Same text here.",
      );

      expect(report.contentCoverage).toEqual({
        coverageRatio: 1,
        missingSectionRatio: 0,
        duplicationRatio: 1,
        overallScore: 0,
      });
    });
  });

  describe("weights", () => {
    it("renormalizes the composite over the weighted metrics", () => {
      const semanticOnly = new RagQualityAnalyzer({
        semanticCompleteness: 2,
        contextPreservation: 0,
        informationDensity: 0,
        structuralIntegrity: 0,
        retrievalReadiness: 0,
        boundaryQuality: 0,
      });
      const report = semanticOnly.analyze(chunks("tiny bit", PARAGRAPH));

      expect(report.compositeScore).toBeCloseTo(report.semanticCompleteness.overallScore, 10);
    });

    it("rejects negative weights", () => {
      expect(() => new RagQualityAnalyzer({ boundaryQuality: -1 })).toThrow(ConfigurationError);
    });
  });

  describe("compare", () => {
    it("ranks chunk sets by composite score", () => {
      const ranked = analyzer.compare([
        { name: "fragments", chunks: chunks("tiny bit", "more bits") },
        { name: "paragraphs", chunks: chunks(PARAGRAPH) },
      ]);

      expect(ranked.map(({ name, rank }) => ({ name, rank }))).toEqual([
        { name: "paragraphs", rank: 1 },
        { name: "fragments", rank: 2 },
      ]);
    });
  });
});
