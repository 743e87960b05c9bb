import type { EnrichOptionsInput } from "../enrichment/ChunkEnricher";
import type { RagQualityReport } from "../quality/types";
import type { RefineOptionsInput } from "../refiner/types";
import type { ChunkOptionsInput } from "../splitter/types";
import type { DocumentChunk, ProgressCallback, RefinedContent } from "../types";
import type { PipelineStage } from "./errors";

/**
 * Reported once when each stage of a document starts.
 */
export interface PipelineProgress {
  /** Id of the raw content being processed */
  documentId: string;
  fileName: string;
  stage: PipelineStage;
}

export interface PipelineOptions {
  refine?: RefineOptionsInput;
  chunk?: ChunkOptionsInput;
  /** `true` enriches with the default options; omitted or `false` skips the stage */
  enrich?: boolean | EnrichOptionsInput;
  /** Scores the chunks against the refined text */
  evaluate?: boolean;
  onProgress?: ProgressCallback<PipelineProgress>;
}

export interface PipelineResult {
  refined: RefinedContent;
  chunks: DocumentChunk[];
  /** Present when evaluation was requested */
  report?: RagQualityReport;
  /** Refinement and enrichment warnings, in stage order */
  warnings: string[];
}
