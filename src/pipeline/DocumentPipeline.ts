import { ChunkEnricher } from "../enrichment/ChunkEnricher";
import { RagQualityAnalyzer } from "../quality/RagQualityAnalyzer";
import { DocumentRefiner } from "../refiner/DocumentRefiner";
import { DocumentChunker } from "../splitter/DocumentChunker";
import type { RawContent } from "../types";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  CancellationError,
  DocumentProcessingError,
  type PipelineStage,
  throwIfCancelled,
} from "./errors";
import type { PipelineOptions, PipelineResult } from "./types";

/**
 * Collaborators of the pipeline. Refiner, chunker and analyzer default to
 * fresh instances; without an enricher the enrichment stage is skipped.
 */
export interface PipelineServices {
  refiner?: DocumentRefiner;
  chunker?: DocumentChunker;
  enricher?: ChunkEnricher;
  analyzer?: RagQualityAnalyzer;
}

/**
 * Runs one document through refinement, chunking and the optional enrichment
 * and evaluation stages. Each stage only reads the output of the one before.
 * A failing stage rejects with a DocumentProcessingError naming the document
 * and the stage; cancellation rejects with a CancellationError.
 */
export class DocumentPipeline {
  private readonly refiner: DocumentRefiner;
  private readonly chunker: DocumentChunker;
  private readonly enricher?: ChunkEnricher;
  private readonly analyzer: RagQualityAnalyzer;

  constructor(services: PipelineServices = {}) {
    this.refiner = services.refiner ?? new DocumentRefiner();
    this.chunker = services.chunker ?? new DocumentChunker();
    this.enricher = services.enricher;
    this.analyzer = services.analyzer ?? new RagQualityAnalyzer();
  }

  async process(
    raw: RawContent,
    options: PipelineOptions = {},
    signal?: AbortSignal,
  ): Promise<PipelineResult> {
    const fileName = raw.file.name;

    const stage = async <T>(name: PipelineStage, run: () => Promise<T> | T): Promise<T> => {
      throwIfCancelled(signal, "Pipeline");
      await options.onProgress?.({ documentId: raw.id, fileName, stage: name });
      try {
        return await run();
      } catch (error) {
        if (error instanceof CancellationError) throw error;
        const cause = toError(error);
        logger.error(`❌ ${fileName} failed during ${name}: ${cause.message}`);
        throw new DocumentProcessingError(cause.message, raw.id, name, cause);
      }
    };

    const refined = await stage("refine", () => this.refiner.refine(raw, options.refine, signal));
    const warnings = [...refined.warnings];

    let chunks = await stage("chunk", () => this.chunker.chunk(refined, options.chunk, signal));

    if (options.enrich) {
      const enricher = this.enricher;
      if (enricher) {
        const enrichOptions = options.enrich === true ? {} : options.enrich;
        const result = await stage("enrich", () =>
          enricher.enrich(chunks, refined, enrichOptions, signal),
        );
        chunks = result.chunks;
        warnings.push(...result.warnings);
      } else {
        const warning = "Enrichment requested but no completion service is configured";
        logger.warn(`⚠️  ${warning}`);
        warnings.push(warning);
      }
    }

    const report = options.evaluate
      ? await stage("evaluate", () => this.analyzer.analyze(chunks, refined.text))
      : undefined;

    logger.info(`✅ Processed ${fileName}: ${chunks.length} chunks`);
    return { refined, chunks, report, warnings };
  }
}
