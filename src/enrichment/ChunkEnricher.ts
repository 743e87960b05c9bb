import { z } from "zod";
import { DEFAULT_ENRICHMENT_INPUT_LIMIT, DEFAULT_SUMMARY_LENGTH } from "../config";
import { CancellationError, throwIfCancelled } from "../pipeline/errors";
import type { ChunkProps, DocumentChunk, RefinedContent } from "../types";
import { ConfigurationError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { truncate } from "../utils/string";
import type { MetadataResult, TextCompletionService } from "./types";

export const enrichOptionsSchema = z.object({
  /** Per-chunk summary and keywords */
  summaries: z.boolean().default(true),
  /** One or two sentences placing each chunk within the document */
  contextualSummaries: z.boolean().default(true),
  /** Document-level topic, domain and entities */
  documentMetadata: z.boolean().default(true),
  maxSummaryLength: z.number().int().positive().default(DEFAULT_SUMMARY_LENGTH),
});

export type EnrichOptions = z.output<typeof enrichOptionsSchema>;
export type EnrichOptionsInput = z.input<typeof enrichOptionsSchema>;

export interface EnrichmentResult {
  chunks: DocumentChunk[];
  /** One entry per failed call */
  warnings: string[];
}

/**
 * Annotates chunks through a text-completion service. Every call is allowed
 * to fail: the failure becomes a warning and the annotation is skipped.
 * Content and positions of the chunks are never touched; the result holds new
 * chunk objects.
 */
export class ChunkEnricher {
  constructor(private readonly service: TextCompletionService) {}

  async enrich(
    chunks: readonly DocumentChunk[],
    refined: RefinedContent,
    options: EnrichOptionsInput = {},
    signal?: AbortSignal,
  ): Promise<EnrichmentResult> {
    const parsed = enrichOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid enrich options: ${parsed.error.message}`);
    }
    const settings = parsed.data;
    const warnings: string[] = [];

    if (!this.service.isAvailable()) {
      logger.debug("Text completion service unavailable, skipping enrichment");
      return { chunks: [...chunks], warnings };
    }

    const attempt = async <T>(what: string, call: () => Promise<T>): Promise<T | undefined> => {
      try {
        return await call();
      } catch (error) {
        if (error instanceof CancellationError) throw error;
        throwIfCancelled(signal, "Enrichment");
        const message = `${what}: ${toError(error).message}`;
        logger.warn(`⚠️  Enrichment skipped for ${message}`);
        warnings.push(message);
        return undefined;
      }
    };

    throwIfCancelled(signal, "Enrichment");
    const documentType = refined.metadata.fileType;
    const metadata: MetadataResult | undefined = settings.documentMetadata
      ? await attempt(refined.metadata.fileName, () =>
          this.service.extractMetadata(refined.text, documentType, signal),
        )
      : undefined;
    const documentExcerpt = truncate(refined.text, DEFAULT_ENRICHMENT_INPUT_LIMIT / 2);

    const enriched: DocumentChunk[] = [];
    for (const chunk of chunks) {
      throwIfCancelled(signal, "Enrichment");
      const label = `chunk ${chunk.index}`;
      const props: ChunkProps = { ...chunk.props, custom: { ...chunk.props.custom } };

      if (settings.summaries) {
        const summary = await attempt(label, () =>
          this.service.summarize(chunk.content, settings.maxSummaryLength, signal),
        );
        if (summary) {
          props.summary = summary.summary;
          props.keywords = summary.keywords;
        }
      }

      if (settings.contextualSummaries) {
        const context = await attempt(label, () =>
          this.service.generate(contextPrompt(refined.metadata.title, documentExcerpt, chunk.content), signal),
        );
        if (context?.trim()) {
          props.contextualSummary = context.trim();
        }
      }

      if (metadata) {
        if (metadata.entities.length > 0) props.entities = metadata.entities;
        if (metadata.topic) props.documentTopic = metadata.topic;
      }

      enriched.push({
        ...chunk,
        topicCategory: metadata?.topic ?? chunk.topicCategory,
        documentDomain: metadata?.domain ?? chunk.documentDomain,
        props,
      });
    }

    logger.debug(`Enriched ${enriched.length} chunks with ${warnings.length} warnings`);
    return { chunks: enriched, warnings };
  }
}

function contextPrompt(title: string, document: string, chunk: string): string {
  return [
    `<document title="${title}">`,
    document,
    "</document>",
    "Here is a chunk of this document:",
    "<chunk>",
    chunk,
    "</chunk>",
    "In one or two sentences, situate this chunk within the overall document to improve search retrieval of the chunk. Answer only with those sentences.",
  ].join("\n");
}
