import { z } from "zod";
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_OVERLAP_SIZE,
  DEFAULT_TARGET_CHUNK_SIZE,
} from "../config";
import type { ChunkingStrategy, ResolvedChunkingStrategy } from "../types";

/**
 * Types of content within a document segment
 */
export type SegmentType = "heading" | "text" | "list" | "code" | "table";

/**
 * Half-open character range `[start, end)` into the chunked text
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * A top-level block of the markdown document with its heading context.
 */
export interface Segment extends TextSpan {
  type: SegmentType;
  /** Heading depth for headings, otherwise the depth of the enclosing section (0 before any heading) */
  level: number;
  /** Titles of the enclosing headings, outermost first */
  path: string[];
}

/**
 * Breaks markdown into position-carrying segments
 */
export interface DocumentSegmenter {
  segment(markdown: string, signal?: AbortSignal): Segment[];
}

/**
 * Range of one chunk before it is stamped into a DocumentChunk.
 */
export interface ChunkSpan extends TextSpan {
  types: SegmentType[];
  section: {
    level: number;
    path: string[];
  };
  /** A single indivisible unit larger than the maximum chunk size */
  oversized: boolean;
}

/**
 * Interface for a splitter that processes markdown content into chunk ranges
 */
export interface DocumentSplitter {
  splitText(markdown: string, signal?: AbortSignal): Promise<ChunkSpan[]>;
}

const STRATEGY_NAMES = new Map<string, ChunkingStrategy>([
  ["auto", "auto"],
  ["sentence", "sentence"],
  ["paragraph", "paragraph"],
  ["token", "token"],
  ["semantic", "semantic"],
  ["hierarchical", "hierarchical"],
  // Legacy names
  ["smart", "sentence"],
  ["intelligent", "semantic"],
  ["fixedsize", "token"],
  ["pagelevel", "paragraph"],
]);

/**
 * Resolves a strategy name case-insensitively, accepting legacy aliases.
 * Unknown or missing names resolve to `auto`.
 */
export function parseChunkingStrategy(name: string | undefined): ChunkingStrategy {
  const key = (name ?? "").trim().toLowerCase().replace(/[\s_-]/g, "");
  return STRATEGY_NAMES.get(key) ?? "auto";
}

/**
 * Chunking options. Sizes are in characters. Minimum and target sizes are
 * capped at the maximum, and the overlap at half of it.
 */
export const chunkOptionsSchema = z
  .object({
    strategy: z.string().optional().transform(parseChunkingStrategy),
    maxChunkSize: z.number().int().positive().default(DEFAULT_MAX_CHUNK_SIZE),
    minChunkSize: z.number().int().nonnegative().default(DEFAULT_MIN_CHUNK_SIZE),
    overlapSize: z.number().int().nonnegative().default(DEFAULT_OVERLAP_SIZE),
    targetChunkSize: z.number().int().positive().default(DEFAULT_TARGET_CHUNK_SIZE),
    preserveParagraphs: z.boolean().default(true),
    preserveSentences: z.boolean().default(true),
  })
  .transform((options) => ({
    ...options,
    minChunkSize: Math.min(options.minChunkSize, options.maxChunkSize),
    targetChunkSize: Math.min(options.targetChunkSize, options.maxChunkSize),
    overlapSize: Math.min(options.overlapSize, Math.floor(options.maxChunkSize / 2)),
  }));

export type ChunkOptions = z.output<typeof chunkOptionsSchema>;
export type ChunkOptionsInput = z.input<typeof chunkOptionsSchema>;

/**
 * Options handed to the chunking engine once `auto` has been resolved.
 */
export type EngineOptions = Omit<ChunkOptions, "strategy"> & {
  strategy: ResolvedChunkingStrategy;
};
