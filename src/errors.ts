// errors.ts
// Failures surfaced to the operator. Game deaths are states, not errors.

/** A vector or network does not fit the configured topology. */
export class ShapeMismatchError extends Error {
  readonly expected: number | string;
  readonly actual: number | string;

  constructor(what: string, expected: number | string, actual: number | string) {
    super(`${what}: expected ${expected} but got ${actual}`);
    this.name = 'ShapeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Persisted network data could not be read or decoded. */
export class SerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
  }
}
