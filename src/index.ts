export * from "./types";
export {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_OVERLAP_SIZE,
  DEFAULT_QUALITY_WEIGHTS,
  DEFAULT_TARGET_CHUNK_SIZE,
  type LlmConfig,
  loadLlmConfig,
} from "./config";

export { DocumentRefiner } from "./refiner/DocumentRefiner";
export { RefinementError } from "./refiner/errors";
export { HeuristicMarkdownConverter } from "./refiner/markdown/HeuristicMarkdownConverter";
export { MarkdownNormalizer } from "./refiner/markdown/MarkdownNormalizer";
export { tableToMarkdown } from "./refiner/markdown/tableToMarkdown";
export {
  type RefineOptions,
  type RefineOptionsInput,
  type RefinerServices,
  refineOptionsSchema,
} from "./refiner/types";

export { DocumentChunker, type ChunkingContext, type SplitterFactory } from "./splitter/DocumentChunker";
export { GreedySplitter } from "./splitter/GreedySplitter";
export { MarkdownSegmenter } from "./splitter/MarkdownSegmenter";
export { analyzeDocumentStructure, selectStrategy } from "./splitter/StrategySelector";
export { ChunkingError, SplitterError } from "./splitter/errors";
export {
  type ChunkOptions,
  type ChunkOptionsInput,
  type DocumentSegmenter,
  type DocumentSplitter,
  chunkOptionsSchema,
  parseChunkingStrategy,
} from "./splitter/types";

export { RagQualityAnalyzer } from "./quality/RagQualityAnalyzer";
export { assessChunkCompleteness } from "./quality/completeness";
export { extractTerms, getOverlapLength, splitIntoSentences } from "./quality/text";
export type {
  NamedChunkSet,
  QualityWeights,
  QualityWeightsInput,
  RagQualityReport,
  RankedQualityReport,
} from "./quality/types";

export {
  ChunkEnricher,
  type EnrichOptions,
  type EnrichOptionsInput,
  type EnrichmentResult,
} from "./enrichment/ChunkEnricher";
export { OpenRouterCompletionService } from "./enrichment/OpenRouterCompletionService";
export { OpenRouterImageToTextService } from "./enrichment/OpenRouterImageToTextService";
export { EnrichmentError } from "./enrichment/errors";
export type {
  ImageToTextService,
  MarkdownConverter,
  TextCompletionService,
} from "./enrichment/types";

export { ReaderRegistry } from "./reader/ReaderRegistry";
export { HtmlDocumentReader } from "./reader/HtmlDocumentReader";
export { TextDocumentReader } from "./reader/TextDocumentReader";
export type { DocumentReader } from "./reader/types";

export { DocumentPipeline, type PipelineServices } from "./pipeline/DocumentPipeline";
export {
  CancellationError,
  DocumentProcessingError,
  PipelineError,
  type PipelineStage,
} from "./pipeline/errors";
export type { PipelineOptions, PipelineProgress, PipelineResult } from "./pipeline/types";

export {
  ConfigurationError,
  DocRefineryError,
  ReaderError,
  UnsupportedFormatError,
} from "./utils/errors";
export { LogLevel, logger, setLogLevel } from "./utils/logger";
