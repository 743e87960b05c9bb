import { STRATEGY_ANALYSIS_SAMPLE_SIZE } from "../config";
import type { ResolvedChunkingStrategy } from "../types";

const HEADING = /^#{1,6}\s+.+$/gm;
const NUMBERED_SECTION = /^(?:\d+(?:[.-]\d+)*\.|\([0-9]+\)|[①②③④⑤⑥⑦⑧⑨⑩])\s+/gm;
const PARAGRAPH_BREAK = /\r?\n\r?\n/;

/**
 * Structural signals of a document sample used to pick a chunking strategy
 */
export interface DocumentStructureAnalysis {
  headingCount: number;
  numberedSectionCount: number;
  paragraphCount: number;
  averageParagraphLength: number;
}

export function analyzeDocumentStructure(text: string): DocumentStructureAnalysis {
  const sample = text.slice(0, STRATEGY_ANALYSIS_SAMPLE_SIZE);
  const paragraphs = sample
    .split(PARAGRAPH_BREAK)
    .filter((paragraph) => paragraph.trim().length > 20);

  return {
    headingCount: sample.match(HEADING)?.length ?? 0,
    numberedSectionCount: sample.match(NUMBERED_SECTION)?.length ?? 0,
    paragraphCount: paragraphs.length,
    averageParagraphLength:
      paragraphs.length > 0
        ? paragraphs.reduce((sum, paragraph) => sum + paragraph.length, 0) / paragraphs.length
        : 0,
  };
}

/**
 * Resolves the `auto` strategy. Documents with markdown headings are chunked
 * hierarchically; numbered steps and long narrative paragraphs are kept together
 * by the paragraph strategy; everything else is chunked by sentence.
 */
export function selectStrategy(text: string): ResolvedChunkingStrategy {
  const analysis = analyzeDocumentStructure(text);

  if (analysis.headingCount >= 3) return "hierarchical";
  if (analysis.numberedSectionCount >= 5) return "paragraph";
  if (analysis.averageParagraphLength > 300) return "paragraph";
  return "sentence";
}
