/** Base class for errors raised by the retrieval core. */
export class RagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The core was wired together incorrectly: mismatched vector/chunk counts,
 * a `create` with nothing to derive the dimension from, and similar.
 */
export class ConfigurationError extends RagError {}

/** A vector's width differs from the dimension established for the index. */
export class DimensionMismatchError extends RagError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context = "vector") {
    super(`Dimension mismatch for ${context}: expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/** Errors that indicate a programming mistake rather than bad data. */
export function isProgrammerError(e: unknown): e is ConfigurationError | DimensionMismatchError {
  return e instanceof ConfigurationError || e instanceof DimensionMismatchError;
}
