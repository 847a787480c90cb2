// Structural Change Analyzer - Error types
// Precondition violations raised before any computation starts.

export class StructuralChangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Two vectors, or a frame and the configured dimensionality, disagree in length. */
export class DimensionMismatchError extends StructuralChangeError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context: string) {
    super(`${context}: expected dimension ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidTimescaleCountError extends StructuralChangeError {
  constructor(count: number) {
    super(`Timescale count must be a non-negative integer, got ${count}`);
  }
}

export class InvalidCovarianceError extends StructuralChangeError {}

/** Untrusted input (HTTP body, WebSocket message) failed validation. */
export class RequestValidationError extends StructuralChangeError {}

/** An environment variable holds a value the service cannot run with. */
export class ConfigError extends StructuralChangeError {}
