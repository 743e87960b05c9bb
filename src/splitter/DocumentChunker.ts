import { v4 as uuidv4 } from "uuid";
import { DOCUMENT_KEYWORD_COUNT } from "../config";
import { CancellationError, throwIfCancelled } from "../pipeline/errors";
import { assessChunkCompleteness } from "../quality/completeness";
import { topTerms } from "../quality/text";
import type {
  ChunkContentType,
  DocumentChunk,
  RefinedContent,
  SourceInfo,
} from "../types";
import { ConfigurationError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ChunkingError } from "./errors";
import { GreedySplitter } from "./GreedySplitter";
import { MarkdownSegmenter } from "./MarkdownSegmenter";
import { selectStrategy } from "./StrategySelector";
import {
  type ChunkOptionsInput,
  type ChunkSpan,
  type DocumentSplitter,
  type EngineOptions,
  chunkOptionsSchema,
} from "./types";

/**
 * Document-level information stamped onto every chunk
 */
export interface ChunkingContext {
  /** Used in error messages */
  fileName: string;
  title: string;
  sourceType: string;
  filePath?: string;
  /** Falls back to the title */
  documentTopic?: string;
}

const TEXT_CONTEXT: ChunkingContext = {
  fileName: "(text)",
  title: "",
  sourceType: "TEXT",
};

/**
 * Creates the chunking engine for one run
 */
export type SplitterFactory = (options: EngineOptions) => DocumentSplitter;

const defaultSplitterFactory: SplitterFactory = (options) =>
  new GreedySplitter(new MarkdownSegmenter(), options);

/**
 * Splits refined markdown into retrieval-sized chunks and stamps them with
 * source information, document-level props and per-chunk scores.
 */
export class DocumentChunker {
  constructor(private readonly createSplitter: SplitterFactory = defaultSplitterFactory) {}

  async chunk(
    refined: RefinedContent,
    options: ChunkOptionsInput = {},
    signal?: AbortSignal,
  ): Promise<DocumentChunk[]> {
    const { metadata } = refined;
    const topSection = refined.sections.find((section) => section.level === 1);
    return this.chunkText(
      refined.text,
      options,
      {
        fileName: metadata.fileName,
        title: metadata.title,
        sourceType: metadata.fileType,
        filePath: metadata.filePath,
        documentTopic: topSection?.title ?? metadata.title,
      },
      signal,
    );
  }

  async chunkText(
    text: string,
    options: ChunkOptionsInput = {},
    context: ChunkingContext = TEXT_CONTEXT,
    signal?: AbortSignal,
  ): Promise<DocumentChunk[]> {
    const parsed = chunkOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid chunk options: ${parsed.error.message}`);
    }
    throwIfCancelled(signal, "Chunking");

    if (text.trim().length === 0) {
      logger.debug(`Nothing to chunk in ${context.fileName}`);
      return [];
    }

    const strategy =
      parsed.data.strategy === "auto" ? selectStrategy(text) : parsed.data.strategy;
    const engineOptions: EngineOptions = { ...parsed.data, strategy };
    logger.debug(
      `Chunking ${context.fileName} (${text.length} characters) with the ${strategy} strategy`,
    );

    let spans: ChunkSpan[];
    try {
      spans = await this.createSplitter(engineOptions).splitText(text, signal);
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      const cause = toError(error);
      throw new ChunkingError(cause.message, context.fileName, cause);
    }

    const sourceInfo: SourceInfo = {
      title: context.title,
      sourceType: context.sourceType,
      filePath: context.filePath,
      chunkCount: spans.length,
    };
    const documentTopic = context.documentTopic || context.title || undefined;
    const documentKeywords = topTerms(text, DOCUMENT_KEYWORD_COUNT);

    const chunks = spans.map((span, index) => {
      throwIfCancelled(signal, "Chunking");
      const content = text.slice(span.start, span.end);
      const qualityScore = assessChunkCompleteness(content);
      const chunk: DocumentChunk = {
        id: uuidv4(),
        index,
        content,
        startPosition: span.start,
        endPosition: span.end,
        strategy,
        contentType: contentTypeOf(span),
        oversized: span.oversized,
        qualityScore,
        importance: importanceOf(span, qualityScore),
        props: {
          documentTopic,
          documentKeywords,
          headingPath: span.section.path,
          custom: {},
        },
        sourceInfo,
      };
      return chunk;
    });

    logger.debug(`Created ${chunks.length} chunks for ${context.fileName}`);
    return chunks;
  }
}

/**
 * Headings only count when nothing else is in the chunk.
 */
function contentTypeOf(span: ChunkSpan): ChunkContentType {
  const types = span.types.filter((type) => type !== "heading");
  if (types.length === 0) return "heading";
  if (types.length === 1) return types[0];
  return "mixed";
}

/**
 * Chunks higher up in the heading hierarchy rank higher; chunks before the
 * first heading fall back to their completeness.
 */
function importanceOf(span: ChunkSpan, qualityScore: number): number {
  const level = span.section.level;
  if (level > 0) return Math.max(0.5, 1 - level * 0.1);
  return qualityScore;
}
