/**
 * A language model collaborator failed or returned something unusable. The
 * enricher turns these into warnings; they never abort a pipeline run.
 */
export class EnrichmentError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(`${operation} failed: ${message}`);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}
