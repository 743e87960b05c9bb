import type { RefinementQuality } from "../types";

export interface RefinementQualityInput {
  originalLength: number;
  refinedLength: number;
  hasStructures: boolean;
  hasSections: boolean;
  usedLlm: boolean;
}

/**
 * Scores how much a refinement removed. A 5-20% reduction is the expected
 * result of stripping noise; larger cuts suggest content was lost.
 */
export function computeCleanupScore(originalLength: number, refinedLength: number): number {
  if (originalLength === 0) return 1.0;
  const reduction = (originalLength - refinedLength) / originalLength;
  if (reduction >= 0.05 && reduction <= 0.2) return 0.9;
  if (reduction >= 0 && reduction < 0.05) return 0.8;
  if (reduction > 0.2 && reduction <= 0.35) return 0.7;
  return 0.5;
}

export function computeRefinementQuality(input: RefinementQualityInput): RefinementQuality {
  const { originalLength, refinedLength, hasStructures, hasSections, usedLlm } = input;

  let structureScore = 0.5;
  if (hasStructures && hasSections) structureScore = 0.9;
  else if (hasStructures || hasSections) structureScore = 0.7;

  return {
    originalLength,
    refinedLength,
    structureScore,
    cleanupScore: computeCleanupScore(originalLength, refinedLength),
    retentionScore: originalLength === 0 ? 1.0 : Math.min(1, refinedLength / originalLength),
    confidenceScore: usedLlm ? 0.85 : 0.75,
  };
}
