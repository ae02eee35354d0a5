/**
 * Error types raised while reading or rewriting a record file.
 */

/**
 * Base class for every failure caused by the input bytes themselves.
 */
export class ReplayFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReplayFormatError';
  }
}

/**
 * An expected byte signature is absent (player count, player record,
 * rating block, chat player id).
 */
export class StructuralNotFoundError extends ReplayFormatError {
  readonly signature: string;

  constructor(signature: string, message: string) {
    super(message);
    this.name = 'StructuralNotFoundError';
    this.signature = signature;
  }
}

/**
 * Fewer bytes remain than a fixed-size read requires.
 */
export class SizeMismatchError extends ReplayFormatError {
  readonly expected: number;
  readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super(`Invalid ${what}: expected ${expected} bytes, got ${actual}`);
    this.name = 'SizeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A chat payload that has to be edited is not valid UTF-8.
 */
export class EncodingFailureError extends ReplayFormatError {
  /** Offset of the affected record in the operations buffer */
  readonly position: number;

  constructor(position: number, message: string) {
    super(message);
    this.name = 'EncodingFailureError';
    this.position = position;
  }
}
