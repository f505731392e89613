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
 * Thrown when a section is built from values that cannot describe a heading
 * (e.g., a header level of zero)
 */
export class SectionValidationError extends SplitterError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`Invalid section ${field}: ${message}`);
  }
}
