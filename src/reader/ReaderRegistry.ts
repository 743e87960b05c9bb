import fs from "node:fs/promises";
import path from "node:path";
import type { FileMetadata, RawContent } from "../types";
import { ReaderError, UnsupportedFormatError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { HtmlDocumentReader } from "./HtmlDocumentReader";
import { TextDocumentReader } from "./TextDocumentReader";
import type { DocumentReader } from "./types";

export class ReaderRegistry {
  private readers: DocumentReader[];

  constructor(readers: DocumentReader[] = [new TextDocumentReader(), new HtmlDocumentReader()]) {
    this.readers = readers;
  }

  get supportedExtensions(): string[] {
    return this.readers.flatMap((reader) => [...reader.extensions]);
  }

  getReader(filePath: string): DocumentReader {
    const extension = path.extname(filePath).toLowerCase();
    const reader = this.readers.find((r) => r.extensions.includes(extension));
    if (!reader) {
      throw new UnsupportedFormatError(filePath, extension);
    }
    return reader;
  }

  /**
   * Reads a file from disk with the reader registered for its extension.
   */
  async read(filePath: string): Promise<RawContent> {
    if (!filePath.trim()) {
      throw new ReaderError("No file path given", filePath);
    }
    const reader = this.getReader(filePath);
    logger.info(`Reading file: ${filePath}`);

    let content: Buffer;
    let file: FileMetadata;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new Error("Not a regular file");
      }
      content = await fs.readFile(filePath);
      file = {
        name: path.basename(filePath),
        extension: path.extname(filePath).toLowerCase(),
        size: stats.size,
        path: path.resolve(filePath),
        createdAt: stats.birthtime,
        modifiedAt: stats.mtime,
      };
    } catch (error) {
      const cause = toError(error);
      throw new ReaderError(cause.message, filePath, cause);
    }

    try {
      return await reader.parse(content, file);
    } catch (error) {
      const cause = toError(error);
      throw new ReaderError(`${reader.readerType} failed: ${cause.message}`, filePath, cause);
    }
  }
}
