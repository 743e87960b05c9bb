import type { TextSpan } from "../types";

/**
 * Common configuration options for content splitters
 */
export interface ContentSplitterOptions {
  /** Maximum characters per piece */
  maxChunkSize: number;
}

/**
 * Core interface for content splitters
 */
export interface ContentSplitter {
  /** Split a range of the text into smaller, non-overlapping ranges */
  split(text: string, span: TextSpan): Promise<TextSpan[]>;
}
