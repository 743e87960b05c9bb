import { ConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";
import { countMatches } from "../utils/string";
import {
  type AnalyzableChunk,
  type BoundaryQualityMetrics,
  type ContentCoverageMetrics,
  type ContextPreservationMetrics,
  type InformationDensityMetrics,
  type NamedChunkSet,
  type QualityMetricName,
  type QualityWeights,
  type QualityWeightsInput,
  type RagQualityReport,
  type RankedQualityReport,
  type RetrievalReadinessMetrics,
  type SemanticCompletenessMetrics,
  type StructuralIntegrityMetrics,
  qualityWeightsSchema,
} from "./types";
import {
  average,
  clampScore,
  endsWithTerminalPunctuation,
  extractTerms,
  getOverlapLength,
  isCompleteSentence,
  isCompleteThought,
  isStopWord,
  splitIntoSentences,
  splitWords,
  startsWithCapital,
  termSimilarity,
} from "./text";

const CONTINUITY_MARKERS = [
  "however",
  "therefore",
  "moreover",
  "furthermore",
  "additionally",
  "consequently",
  "thus",
  "hence",
];

const LEADING_REFERENCE = /\b(?:he|she|it|they|this|that|these|those)\b/i;
const UNRESOLVED_START = /^(?:he|she|it|they|this|that|these|those)\b/i;
const HEADER = /^#{1,6}\s+.+$/m;
const SETEXT_HEADER = /^.+\n[=-]+$/m;
const BULLET_ITEM = /^[*\-+]\s+.+$/gm;
const NUMBERED_ITEM = /^\d+\.\s+.+$/gm;
const CLOSED_CODE_BLOCK = /```[\s\S]*?```/;
const CODE_FENCE = /```/g;
const TABLE = /\|.+\|.*\n\|[-:\s|]+\|/;
const WH_WORD = /\b(?:what|when|where|who|why|how)\b/i;
const DEFINITION = /\bis\b.*\b(?:defined as|refers to|means)\b/i;
const PROPER_NOUN = /\b[A-Z][a-z]+\b/g;
const NUMERAL = /\b\d+\b/g;

/** Neighbours on each side considered for context-window coverage */
const CONTEXT_WINDOW = 2;
/** Overlaps shorter than this are treated as coincidental */
const MIN_MEANINGFUL_OVERLAP = 21;
const MAX_OVERLAP_SCAN = 256;
const MAX_EXPECTED_OVERLAP = 128;
/** Arbitrary tuning constant rewarding an overlap that contains a sentence end */
const SENTENCE_OVERLAP_BONUS = 1.2;

const NO_CHUNKS_RECOMMENDATION =
  "No chunks were produced. Check that the document contains extractable text.";
const SATISFACTORY_RECOMMENDATION =
  "Quality metrics are satisfactory. Current configuration is well-optimized for RAG.";

const METRIC_NAMES: readonly QualityMetricName[] = [
  "semanticCompleteness",
  "contextPreservation",
  "informationDensity",
  "structuralIntegrity",
  "retrievalReadiness",
  "boundaryQuality",
];

/**
 * Scores how well a chunk set serves retrieval-augmented generation. The six
 * metrics are computed independently from chunk content and order; none of
 * them reads another's result. Analysis never throws: degenerate content
 * scores 0 where it cannot be measured.
 */
export class RagQualityAnalyzer {
  private readonly weights: QualityWeights;

  constructor(weights: QualityWeightsInput = {}) {
    const parsed = qualityWeightsSchema.safeParse(weights);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid quality weights: ${parsed.error.message}`);
    }
    this.weights = parsed.data;
  }

  analyze(chunks: readonly AnalyzableChunk[], originalText?: string): RagQualityReport {
    const contents = chunks.map((chunk) => chunk.content);
    logger.debug(`Analyzing quality of ${contents.length} chunks`);

    if (contents.length === 0) {
      return this.emptyReport(originalText);
    }

    const semanticCompleteness = this.analyzeSemanticCompleteness(contents);
    const contextPreservation = this.analyzeContextPreservation(contents);
    const informationDensity = this.analyzeInformationDensity(contents);
    const structuralIntegrity = this.analyzeStructuralIntegrity(contents);
    const retrievalReadiness = this.analyzeRetrievalReadiness(contents);
    const boundaryQuality = this.analyzeBoundaryQuality(contents);
    const contentCoverage =
      originalText && originalText.trim().length > 0
        ? this.analyzeContentCoverage(contents, originalText)
        : undefined;

    const compositeScore = this.compositeScore({
      semanticCompleteness: semanticCompleteness.overallScore,
      contextPreservation: contextPreservation.overallScore,
      informationDensity: informationDensity.overallScore,
      structuralIntegrity: structuralIntegrity.overallScore,
      retrievalReadiness: retrievalReadiness.overallScore,
      boundaryQuality: boundaryQuality.overallScore,
    });

    const report: RagQualityReport = {
      totalChunks: contents.length,
      compositeScore,
      semanticCompleteness,
      contextPreservation,
      informationDensity,
      structuralIntegrity,
      retrievalReadiness,
      boundaryQuality,
      contentCoverage,
      recommendations: [],
      analyzedAt: new Date(),
    };
    report.recommendations = this.recommendations(report);

    logger.debug(`Composite quality score: ${compositeScore.toFixed(3)}`);
    return report;
  }

  /**
   * Analyzes several chunk sets of the same document and ranks them by
   * composite score, best first. Ties keep the input order.
   */
  compare(sets: readonly NamedChunkSet[], originalText?: string): RankedQualityReport[] {
    return sets
      .map((set) => ({ name: set.name, report: this.analyze(set.chunks, originalText) }))
      .sort((a, b) => b.report.compositeScore - a.report.compositeScore)
      .map((entry, index) => ({ ...entry, rank: index + 1 }));
  }

  private analyzeSemanticCompleteness(contents: string[]): SemanticCompletenessMetrics {
    let totalSentences = 0;
    let completeSentences = 0;
    let completeThoughts = 0;
    let orphanedFragments = 0;
    const boundaryScores: number[] = [];

    for (const raw of contents) {
      const content = raw.trim();
      const sentences = splitIntoSentences(content);
      totalSentences += sentences.length;
      completeSentences += sentences.filter(isCompleteSentence).length;
      if (isCompleteThought(content)) completeThoughts++;
      if (isOrphanedFragment(content)) orphanedFragments++;
      boundaryScores.push(sentenceBoundaryScore(content));
    }

    const completeSentenceRatio = totalSentences > 0 ? completeSentences / totalSentences : 0;
    const completeThoughtRatio = completeThoughts / contents.length;
    const orphanedFragmentRatio = orphanedFragments / contents.length;
    const averageBoundaryScore = average(boundaryScores);

    return {
      completeSentenceRatio,
      completeThoughtRatio,
      orphanedFragmentRatio,
      averageBoundaryScore,
      overallScore: clampScore(
        completeSentenceRatio * 0.3 +
          completeThoughtRatio * 0.3 +
          (1 - orphanedFragmentRatio) * 0.2 +
          averageBoundaryScore * 0.2,
      ),
    };
  }

  private analyzeContextPreservation(contents: string[]): ContextPreservationMetrics {
    // A single chunk has no context to lose
    if (contents.length < 2) {
      return {
        averageOverlapScore: 1,
        continuityScore: 1,
        referencePreservationScore: 1,
        contextWindowCoverage: 1,
        overallScore: 1,
      };
    }

    const overlapScores: number[] = [];
    const continuityScores: number[] = [];
    const referenceScores: number[] = [];
    for (let i = 1; i < contents.length; i++) {
      overlapScores.push(overlapQuality(contents[i - 1], contents[i]));
      continuityScores.push(continuityScore(contents[i]));
      referenceScores.push(referencePreservation(contents[i]));
    }

    const averageOverlapScore = average(overlapScores);
    const continuity = average(continuityScores);
    const referencePreservationScore = average(referenceScores);
    const contextWindowCoverage = average(
      contents.map((content, index) => contextWindowScore(content, contents, index)),
    );

    return {
      averageOverlapScore,
      continuityScore: continuity,
      referencePreservationScore,
      contextWindowCoverage,
      overallScore: clampScore(
        averageOverlapScore * 0.3 +
          continuity * 0.3 +
          referencePreservationScore * 0.2 +
          contextWindowCoverage * 0.2,
      ),
    };
  }

  private analyzeInformationDensity(contents: string[]): InformationDensityMetrics {
    const averageTokenDensity = average(contents.map(tokenDensity));
    const redundancyScore = average(contents.map(redundancy));
    const uniqueTermRatio = average(
      contents.map((content) => {
        const terms = extractTerms(content);
        return terms.length > 0 ? new Set(terms).size / terms.length : 0;
      }),
    );
    const informationEntropy = normalizedEntropy(contents.flatMap(extractTerms));

    return {
      averageTokenDensity,
      redundancyScore,
      uniqueTermRatio,
      informationEntropy,
      overallScore: clampScore(
        averageTokenDensity * 0.3 +
          (1 - redundancyScore) * 0.3 +
          uniqueTermRatio * 0.2 +
          informationEntropy * 0.2,
      ),
    };
  }

  private analyzeStructuralIntegrity(contents: string[]): StructuralIntegrityMetrics {
    let headers = 0;
    let lists = 0;
    let codeBlocks = 0;
    let tables = 0;
    let broken = 0;

    for (const content of contents) {
      if (hasCompleteHeader(content)) headers++;
      if (hasCompleteList(content)) lists++;
      if (CLOSED_CODE_BLOCK.test(content)) codeBlocks++;
      if (TABLE.test(content)) tables++;
      if (hasBrokenStructure(content)) broken++;
    }

    const total = headers + lists + codeBlocks + tables;
    const brokenStructureRatio = broken / contents.length;

    return {
      headerPreservation: headers / contents.length,
      listPreservation: lists / contents.length,
      codeBlockPreservation: codeBlocks / contents.length,
      tablePreservation: tables / contents.length,
      brokenStructureRatio,
      overallScore: clampScore(total > 0 ? (total - broken) / total : 1 - brokenStructureRatio),
    };
  }

  private analyzeRetrievalReadiness(contents: string[]): RetrievalReadinessMetrics {
    const selfContainedRatio = contents.filter(isSelfContained).length / contents.length;
    const keywordRichness = contents.filter(isKeywordRich).length / contents.length;
    const averageSummaryQuality = average(contents.map(summaryQuality));
    const queryMatchPotential = average(contents.map(queryMatchScore));

    return {
      selfContainedRatio,
      keywordRichness,
      averageSummaryQuality,
      queryMatchPotential,
      overallScore: clampScore(
        selfContainedRatio * 0.3 +
          keywordRichness * 0.2 +
          averageSummaryQuality * 0.25 +
          queryMatchPotential * 0.25,
      ),
    };
  }

  private analyzeBoundaryQuality(contents: string[]): BoundaryQualityMetrics {
    const cleanStartRatio = contents.filter(hasCleanStart).length / contents.length;
    const cleanEndRatio = contents.filter(hasCleanEnd).length / contents.length;

    // No transitions to judge in a single chunk
    if (contents.length < 2) {
      return { cleanStartRatio, cleanEndRatio, transitionQuality: 1, overallScore: 1 };
    }

    const transitions: number[] = [];
    for (let i = 0; i < contents.length - 1; i++) {
      transitions.push(transitionQuality(contents[i], contents[i + 1]));
    }
    const transition = average(transitions);

    return {
      cleanStartRatio,
      cleanEndRatio,
      transitionQuality: transition,
      overallScore: clampScore(cleanStartRatio * 0.35 + cleanEndRatio * 0.35 + transition * 0.3),
    };
  }

  private analyzeContentCoverage(contents: string[], originalText: string): ContentCoverageMetrics {
    const combined = contents.join(" ");
    const coverageRatio = combined.length / originalText.length;

    const originalSentences = splitIntoSentences(originalText).length;
    const chunkSentences = splitIntoSentences(combined).length;
    const missingSectionRatio =
      originalSentences > 0 ? clampScore(1 - chunkSentences / originalSentences) : 0;

    const occurrences = new Map<string, number>();
    for (const content of contents) {
      occurrences.set(content, (occurrences.get(content) ?? 0) + 1);
    }
    const duplicates = contents.filter((content) => (occurrences.get(content) ?? 0) > 1).length;
    const duplicationRatio = duplicates / contents.length;

    return {
      coverageRatio: clampScore(coverageRatio),
      missingSectionRatio,
      duplicationRatio,
      overallScore: clampScore(
        Math.min(1, coverageRatio) * (1 - missingSectionRatio) * (1 - duplicationRatio),
      ),
    };
  }

  /**
   * Weighted mean of the metric scores, renormalized over the metrics that
   * carry a weight.
   */
  private compositeScore(scores: Record<QualityMetricName, number>): number {
    let weightedSum = 0;
    let totalWeight = 0;
    for (const name of METRIC_NAMES) {
      weightedSum += scores[name] * this.weights[name];
      totalWeight += this.weights[name];
    }
    return totalWeight > 0 ? clampScore(weightedSum / totalWeight) : 0;
  }

  private recommendations(report: RagQualityReport): string[] {
    const {
      semanticCompleteness,
      contextPreservation,
      informationDensity,
      structuralIntegrity,
      retrievalReadiness,
      boundaryQuality,
    } = report;
    const recommendations: string[] = [];

    if (semanticCompleteness.orphanedFragmentRatio > 0.2) {
      recommendations.push(
        "High ratio of orphaned fragments detected. Consider increasing chunk size or improving boundary detection.",
      );
    }
    if (semanticCompleteness.completeSentenceRatio < 0.7) {
      recommendations.push(
        "Many chunks lack complete sentences. Adjust chunking strategy to preserve sentence boundaries.",
      );
    }
    if (contextPreservation.averageOverlapScore < 0.3) {
      recommendations.push(
        "Low overlap between chunks. Increase overlap size to improve context preservation.",
      );
    }
    if (contextPreservation.referencePreservationScore < 0.5) {
      recommendations.push(
        "Poor reference preservation. Consider using semantic-aware chunking strategies.",
      );
    }
    if (informationDensity.redundancyScore > 0.3) {
      recommendations.push(
        "High redundancy detected. Optimize chunking to reduce duplicate information.",
      );
    }
    if (informationDensity.averageTokenDensity < 0.5) {
      recommendations.push(
        "Low information density. Consider filtering or preprocessing to remove filler content.",
      );
    }
    if (structuralIntegrity.brokenStructureRatio > 0.1) {
      recommendations.push(
        "Broken structures detected. Use structure-aware chunking for documents with lists, tables, or code blocks.",
      );
    }
    if (retrievalReadiness.selfContainedRatio < 0.6) {
      recommendations.push(
        "Many chunks are not self-contained. Adjust strategy to create more independent chunks.",
      );
    }
    if (retrievalReadiness.keywordRichness < 0.5) {
      recommendations.push(
        "Low keyword richness. Consider preprocessing to enhance searchable terms.",
      );
    }
    if (boundaryQuality.transitionQuality < 0.5) {
      recommendations.push(
        "Poor transitions between chunks. Improve boundary detection algorithms.",
      );
    }
    if (report.compositeScore < 0.6) {
      recommendations.push(
        "Overall quality below threshold. Consider using the 'Semantic' chunking strategy with appropriate parameters.",
      );
    }

    return recommendations.length > 0 ? recommendations : [SATISFACTORY_RECOMMENDATION];
  }

  private emptyReport(originalText?: string): RagQualityReport {
    return {
      totalChunks: 0,
      compositeScore: 0,
      semanticCompleteness: {
        completeSentenceRatio: 0,
        completeThoughtRatio: 0,
        orphanedFragmentRatio: 0,
        averageBoundaryScore: 0,
        overallScore: 0,
      },
      contextPreservation: {
        averageOverlapScore: 0,
        continuityScore: 0,
        referencePreservationScore: 0,
        contextWindowCoverage: 0,
        overallScore: 0,
      },
      informationDensity: {
        averageTokenDensity: 0,
        redundancyScore: 0,
        uniqueTermRatio: 0,
        informationEntropy: 0,
        overallScore: 0,
      },
      structuralIntegrity: {
        headerPreservation: 0,
        listPreservation: 0,
        codeBlockPreservation: 0,
        tablePreservation: 0,
        brokenStructureRatio: 0,
        overallScore: 0,
      },
      retrievalReadiness: {
        selfContainedRatio: 0,
        keywordRichness: 0,
        averageSummaryQuality: 0,
        queryMatchPotential: 0,
        overallScore: 0,
      },
      boundaryQuality: {
        cleanStartRatio: 0,
        cleanEndRatio: 0,
        transitionQuality: 0,
        overallScore: 0,
      },
      contentCoverage:
        originalText && originalText.trim().length > 0
          ? { coverageRatio: 0, missingSectionRatio: 1, duplicationRatio: 0, overallScore: 0 }
          : undefined,
      recommendations: [NO_CHUNKS_RECOMMENDATION],
      analyzedAt: new Date(),
    };
  }
}

function isOrphanedFragment(content: string): boolean {
  return content.length < 50 || !/[.!?]/.test(content);
}

function sentenceBoundaryScore(content: string): number {
  if (content.length === 0) return 0;
  let score = 0;
  if (startsWithCapital(content)) score += 0.5;
  if (endsWithTerminalPunctuation(content)) score += 0.5;
  return score;
}

/**
 * Overlap length relative to the expected overlap, a quarter of the shorter
 * chunk (at most 128 characters).
 */
function overlapQuality(previous: string, current: string): number {
  const length = getOverlapLength(previous, current, MAX_OVERLAP_SCAN, MIN_MEANINGFUL_OVERLAP);
  if (length === 0) return 0;

  const expected = Math.min(
    MAX_EXPECTED_OVERLAP,
    Math.floor(Math.min(previous.length, current.length) / 4),
  );
  let score = Math.min(1, length / expected);
  const overlap = current.slice(0, length);
  if (/[.!?]/.test(overlap)) {
    score = Math.min(1, score * SENTENCE_OVERLAP_BONUS);
  }
  return score;
}

function continuityScore(current: string): number {
  const lower = current.toLowerCase();
  const continues = CONTINUITY_MARKERS.some(
    (marker) => lower.startsWith(marker) || lower.includes(` ${marker}`),
  );
  return continues ? 1 : 0.5;
}

/**
 * A pronoun near the start of a chunk likely refers to the previous one.
 */
function referencePreservation(current: string): number {
  return LEADING_REFERENCE.test(current.slice(0, 100)) ? 0.5 : 1;
}

/**
 * Share of a chunk's distinct terms that also occur within two chunks on
 * either side.
 */
function contextWindowScore(content: string, contents: string[], index: number): number {
  const first = Math.max(0, index - CONTEXT_WINDOW);
  const last = Math.min(contents.length - 1, index + CONTEXT_WINDOW);
  if (first === last) return 1;

  const windowTerms = new Set<string>();
  for (let i = first; i <= last; i++) {
    if (i === index) continue;
    for (const term of extractTerms(contents[i])) windowTerms.add(term);
  }

  const terms = new Set(extractTerms(content));
  if (terms.size === 0) return 0;
  let shared = 0;
  for (const term of terms) {
    if (windowTerms.has(term)) shared++;
  }
  return shared / terms.size;
}

function tokenDensity(content: string): number {
  const words = splitWords(content);
  if (words.length === 0) return 0;
  const meaningful = words.filter((word) => word.length > 3 && !isStopWord(word)).length;
  return meaningful / words.length;
}

/**
 * Sum of the similarities of sentence pairs that are more than 70% alike,
 * divided by the number of pairs.
 */
function redundancy(content: string): number {
  const sentences = splitIntoSentences(content);
  if (sentences.length < 2) return 0;

  let total = 0;
  for (let i = 0; i < sentences.length - 1; i++) {
    for (let j = i + 1; j < sentences.length; j++) {
      const similarity = termSimilarity(sentences[i], sentences[j]);
      if (similarity > 0.7) total += similarity;
    }
  }
  const pairs = (sentences.length * (sentences.length - 1)) / 2;
  return total / pairs;
}

/**
 * Shannon entropy of the term distribution in bits, divided by its maximum
 * for the vocabulary size.
 */
function normalizedEntropy(terms: string[]): number {
  const frequencies = new Map<string, number>();
  for (const term of terms) {
    frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
  }
  if (frequencies.size <= 1) return 0;

  let entropy = 0;
  for (const frequency of frequencies.values()) {
    const p = frequency / terms.length;
    entropy -= p * Math.log2(p);
  }
  return clampScore(entropy / Math.log2(frequencies.size));
}

function hasCompleteHeader(content: string): boolean {
  return HEADER.test(content) || SETEXT_HEADER.test(content);
}

function hasCompleteList(content: string): boolean {
  return countMatches(content, BULLET_ITEM) + countMatches(content, NUMBERED_ITEM) >= 2;
}

/**
 * An unmatched code fence or a bullet list reduced to a single item.
 */
function hasBrokenStructure(content: string): boolean {
  const unclosedFence = countMatches(content, CODE_FENCE) % 2 === 1;
  const orphanedListItem = countMatches(content, BULLET_ITEM) === 1;
  return unclosedFence || orphanedListItem;
}

function isSelfContained(content: string): boolean {
  return isCompleteThought(content) && !UNRESOLVED_START.test(content.trim());
}

function isKeywordRich(content: string): boolean {
  const terms = extractTerms(content);
  const unique = new Set(terms).size;
  return unique > 10 && terms.length > 0 && unique / terms.length > 0.2;
}

/**
 * How well the first sentence summarizes the rest of the chunk.
 */
function summaryQuality(content: string): number {
  const sentences = splitIntoSentences(content);
  if (sentences.length === 0) return 0;

  const [first, ...rest] = sentences;
  let score = 0;
  if (first.length > 20 && first.length < 200) score += 0.3;
  if (isCompleteSentence(first)) score += 0.3;

  if (rest.length === 0) {
    return score + 0.4;
  }

  const firstTerms = new Set(extractTerms(first));
  const restTerms = new Set(extractTerms(rest.join(" ")));
  if (restTerms.size > 0) {
    let shared = 0;
    for (const term of restTerms) {
      if (firstTerms.has(term)) shared++;
    }
    score += 0.4 * (shared / restTerms.size);
  }
  return score;
}

function queryMatchScore(content: string): number {
  let score = 0;
  if (WH_WORD.test(content)) score += 0.2;
  if (DEFINITION.test(content)) score += 0.2;
  if (extractTerms(content).length > 20) score += 0.2;
  if (countMatches(content, PROPER_NOUN) > 2) score += 0.2;
  if (countMatches(content, NUMERAL) > 2) score += 0.2;
  return Math.min(1, score);
}

function hasCleanStart(content: string): boolean {
  const trimmed = content.trimStart();
  if (trimmed.length === 0) return false;
  return startsWithCapital(trimmed) || trimmed.startsWith("#") || /^\d+\./.test(trimmed);
}

function hasCleanEnd(content: string): boolean {
  const trimmed = content.trimEnd();
  if (trimmed.length === 0) return false;
  return endsWithTerminalPunctuation(trimmed) || trimmed.endsWith("```");
}

/**
 * 0.4 overlap, 0.3 continuity, 0.15 each for a clean end of the first chunk
 * and a clean start of the second.
 */
function transitionQuality(current: string, next: string): number {
  let score = overlapQuality(current, next) * 0.4 + continuityScore(next) * 0.3;
  if (hasCleanEnd(current)) score += 0.15;
  if (hasCleanStart(next)) score += 0.15;
  return score;
}
