import { z } from "zod";
import { DEFAULT_QUALITY_WEIGHTS } from "../config";

/**
 * The part of a chunk the analyzer looks at. Any DocumentChunk qualifies.
 */
export interface AnalyzableChunk {
  readonly content: string;
}

export interface SemanticCompletenessMetrics {
  /** Complete sentences over all sentences */
  completeSentenceRatio: number;
  completeThoughtRatio: number;
  orphanedFragmentRatio: number;
  averageBoundaryScore: number;
  overallScore: number;
}

export interface ContextPreservationMetrics {
  averageOverlapScore: number;
  continuityScore: number;
  referencePreservationScore: number;
  contextWindowCoverage: number;
  overallScore: number;
}

export interface InformationDensityMetrics {
  averageTokenDensity: number;
  redundancyScore: number;
  uniqueTermRatio: number;
  informationEntropy: number;
  overallScore: number;
}

export interface StructuralIntegrityMetrics {
  headerPreservation: number;
  listPreservation: number;
  codeBlockPreservation: number;
  tablePreservation: number;
  brokenStructureRatio: number;
  overallScore: number;
}

export interface RetrievalReadinessMetrics {
  selfContainedRatio: number;
  keywordRichness: number;
  averageSummaryQuality: number;
  queryMatchPotential: number;
  overallScore: number;
}

export interface BoundaryQualityMetrics {
  cleanStartRatio: number;
  cleanEndRatio: number;
  transitionQuality: number;
  overallScore: number;
}

export interface ContentCoverageMetrics {
  coverageRatio: number;
  missingSectionRatio: number;
  duplicationRatio: number;
  overallScore: number;
}

/**
 * Quality of one chunk set. Every score lies in [0, 1].
 */
export interface RagQualityReport {
  totalChunks: number;
  compositeScore: number;
  semanticCompleteness: SemanticCompletenessMetrics;
  contextPreservation: ContextPreservationMetrics;
  informationDensity: InformationDensityMetrics;
  structuralIntegrity: StructuralIntegrityMetrics;
  retrievalReadiness: RetrievalReadinessMetrics;
  boundaryQuality: BoundaryQualityMetrics;
  /** Only present when the pre-chunking text was supplied */
  contentCoverage?: ContentCoverageMetrics;
  recommendations: string[];
  analyzedAt: Date;
}

/**
 * Chunk set to compare against others, usually one per chunking strategy
 */
export interface NamedChunkSet {
  name: string;
  chunks: readonly AnalyzableChunk[];
}

export interface RankedQualityReport {
  name: string;
  rank: number;
  report: RagQualityReport;
}

const weight = (fallback: number) => z.number().nonnegative().finite().default(fallback);

/**
 * Composite weights. Missing entries take the defaults; a zero weight leaves
 * the metric out of the composite.
 */
export const qualityWeightsSchema = z.object({
  semanticCompleteness: weight(DEFAULT_QUALITY_WEIGHTS.semanticCompleteness),
  contextPreservation: weight(DEFAULT_QUALITY_WEIGHTS.contextPreservation),
  informationDensity: weight(DEFAULT_QUALITY_WEIGHTS.informationDensity),
  structuralIntegrity: weight(DEFAULT_QUALITY_WEIGHTS.structuralIntegrity),
  retrievalReadiness: weight(DEFAULT_QUALITY_WEIGHTS.retrievalReadiness),
  boundaryQuality: weight(DEFAULT_QUALITY_WEIGHTS.boundaryQuality),
});

export type QualityWeights = z.output<typeof qualityWeightsSchema>;
export type QualityWeightsInput = z.input<typeof qualityWeightsSchema>;

export type QualityMetricName = keyof QualityWeights;
