/**
 * Base error class for all splitter-related errors
 */
export class SplitterError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when the markdown of a document cannot be segmented
 */
export class ContentSplitterError extends SplitterError {}

/**
 * Wraps any failure of the chunking engine with the name of the source file
 */
export class ChunkingError extends SplitterError {
  constructor(
    message: string,
    public readonly fileName: string,
    cause?: Error,
  ) {
    super(`Chunking failed for ${fileName}: ${message}`, cause);
  }
}
