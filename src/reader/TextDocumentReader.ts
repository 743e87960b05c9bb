import { v4 as uuidv4 } from "uuid";
import type { FileMetadata, RawContent } from "../types";
import { normalizeLineEndings } from "../utils/string";
import type { DocumentReader } from "./types";

const BOM = /^\uFEFF/;

/**
 * Reads plain text and markdown files. The text is passed through unchanged
 * apart from line endings and a leading byte order mark; the refiner does the
 * rest.
 */
export class TextDocumentReader implements DocumentReader {
  readonly extensions = [".txt", ".md", ".markdown"] as const;
  readonly readerType = "TextDocumentReader";

  parse(content: Buffer, file: FileMetadata): RawContent {
    const text = normalizeLineEndings(content.toString("utf-8").replace(BOM, ""));
    return {
      id: uuidv4(),
      text,
      tables: [],
      blocks: [],
      images: [],
      file,
      warnings: text.trim() ? [] : [`${file.name} contains no text`],
      readerType: this.readerType,
    };
  }
}
