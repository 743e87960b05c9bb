import { v4 as uuidv4 } from "uuid";
import { CancellationError, throwIfCancelled } from "../pipeline/errors";
import type { DocumentMetadata, RawContent, RefinedContent } from "../types";
import { ConfigurationError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { RefinementError } from "./errors";
import { HeuristicMarkdownConverter } from "./markdown/HeuristicMarkdownConverter";
import { computeRefinementQuality } from "./quality";
import { RefinementPipeline } from "./RefinementPipeline";
import { MarkdownNormalizationStep } from "./steps/MarkdownNormalizationStep";
import { NoiseCleanupStep } from "./steps/NoiseCleanupStep";
import { SectionBuildingStep } from "./steps/SectionBuildingStep";
import { SectionPromotionStep } from "./steps/SectionPromotionStep";
import { StructureExtractionStep } from "./steps/StructureExtractionStep";
import { StructuredMarkdownStep } from "./steps/StructuredMarkdownStep";
import { WhitespaceNormalizationStep } from "./steps/WhitespaceNormalizationStep";
import {
  type RefineOptionsInput,
  type RefinementContext,
  type RefinerServices,
  refineOptionsSchema,
} from "./types";

const FIRST_H1 = /^#[ \t]+(.+?)[ \t#]*$/m;

/**
 * Turns raw extracted content into normalized markdown with sections,
 * structured elements and quality scores.
 *
 * Individual steps degrade to "text unchanged plus a warning". Only a missing
 * input, invalid options, cancellation or an unexpected failure outside the
 * steps abort a refinement.
 */
export class DocumentRefiner {
  private readonly services: RefinerServices;
  private readonly pipeline: RefinementPipeline;

  constructor(services: RefinerServices = {}) {
    this.services = {
      ...services,
      markdownConverter: services.markdownConverter ?? new HeuristicMarkdownConverter(),
    };
    this.pipeline = new RefinementPipeline([
      new NoiseCleanupStep(),
      new SectionPromotionStep(),
      new StructuredMarkdownStep(),
      new MarkdownNormalizationStep(),
      new StructureExtractionStep(),
      new WhitespaceNormalizationStep(),
      new SectionBuildingStep(),
    ]);
  }

  async refine(
    raw: RawContent | null | undefined,
    options: RefineOptionsInput = {},
    signal?: AbortSignal,
  ): Promise<RefinedContent> {
    if (!raw || typeof raw.text !== "string") {
      throw new RefinementError("No raw content supplied", raw?.file?.name ?? "(unknown)");
    }

    const parsed = refineOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid refine options: ${parsed.error.message}`);
    }

    throwIfCancelled(signal, "Refinement");

    const startedAt = performance.now();
    logger.debug(`Refining ${raw.file.name} (${raw.text.length} characters)`);

    const context: RefinementContext = {
      text: raw.text,
      raw,
      options: parsed.data,
      services: this.services,
      sections: [],
      structures: [],
      warnings: [],
      usedLlm: false,
      signal,
    };

    try {
      await this.pipeline.run(context);
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      const cause = toError(error);
      throw new RefinementError(cause.message, raw.file.name, cause);
    }

    const durationMs = performance.now() - startedAt;
    const refined: RefinedContent = {
      id: uuidv4(),
      rawId: raw.id,
      text: context.text,
      sections: context.sections,
      structures: context.structures,
      metadata: buildMetadata(raw, context.text),
      quality: computeRefinementQuality({
        originalLength: raw.text.length,
        refinedLength: context.text.length,
        hasStructures: context.structures.length > 0,
        hasSections: context.sections.length > 0,
        usedLlm: context.usedLlm,
      }),
      info: {
        refinerType: this.constructor.name,
        usedLlm: context.usedLlm,
        durationMs,
        refinedAt: new Date(),
      },
      warnings: context.warnings,
    };

    logger.debug(
      `Refined ${raw.file.name}: ${raw.text.length} → ${refined.text.length} characters, ${refined.sections.length} sections, ${refined.structures.length} structures`,
    );
    return refined;
  }
}

function buildMetadata(raw: RawContent, text: string): DocumentMetadata {
  const title = text.match(FIRST_H1)?.[1].trim() || raw.file.name;
  return {
    fileName: raw.file.name,
    fileType: raw.file.extension.replace(/^\./, "").toUpperCase(),
    fileSize: raw.file.size,
    title,
    filePath: raw.file.path,
    createdAt: raw.file.createdAt,
    modifiedAt: raw.file.modifiedAt,
  };
}
