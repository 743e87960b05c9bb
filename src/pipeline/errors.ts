export class PipelineError extends Error {
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
 * A document failed in one stage of the pipeline. The message names the
 * document and the stage; the underlying error is kept as `cause`.
 */
export class DocumentProcessingError extends PipelineError {
  constructor(
    message: string,
    public readonly documentId: string,
    public readonly stage: PipelineStage,
    cause?: Error,
  ) {
    super(`Failed to process document ${documentId} during ${stage}: ${message}`, cause);
  }
}

/**
 * Error indicating that an operation was cancelled.
 */
export class CancellationError extends PipelineError {
  constructor(message = "Operation cancelled") {
    super(message);
  }
}

export type PipelineStage = "read" | "refine" | "chunk" | "enrich" | "evaluate";

/**
 * Throws a CancellationError when the signal has been aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, what?: string): void {
  if (signal?.aborted) {
    throw new CancellationError(what ? `${what} cancelled` : undefined);
  }
}
