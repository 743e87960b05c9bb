class DocRefineryError extends Error {
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
 * Raised when an input file cannot be read or has no matching reader.
 */
class ReaderError extends DocRefineryError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`Failed to read ${filePath}: ${message}`, cause);
  }
}

class UnsupportedFormatError extends ReaderError {
  constructor(filePath: string, extension: string) {
    super(`Unsupported file extension '${extension || "(none)"}'`, filePath);
  }
}

/**
 * Raised for invalid options or environment configuration.
 */
class ConfigurationError extends DocRefineryError {}

/**
 * Normalizes an unknown thrown value into an Error instance.
 */
function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export { DocRefineryError, ReaderError, UnsupportedFormatError, ConfigurationError, toError };
