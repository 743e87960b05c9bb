import type { FileMetadata, RawContent } from "../types";

/**
 * Extracts a single input format into raw content.
 */
export interface DocumentReader {
  /** Lowercase extensions including the dot, e.g. ".md" */
  readonly extensions: readonly string[];
  /** Identifier stored in `RawContent.readerType` */
  readonly readerType: string;
  /**
   * Converts the file contents. Implementations only parse; reading from disk
   * is done by the registry.
   */
  parse(content: Buffer, file: FileMetadata): RawContent | Promise<RawContent>;
}
