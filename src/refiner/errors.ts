/**
 * Raised when a document cannot be refined at all. Individual steps never
 * raise this; they degrade and record a warning instead.
 */
export class RefinementError extends Error {
  constructor(
    message: string,
    public readonly fileName: string,
    public readonly cause?: Error,
  ) {
    super(`Refinement failed for ${fileName}: ${message}`);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}
