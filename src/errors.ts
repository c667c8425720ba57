/**
 * Error hierarchy for GFF reading, writing and field access.
 */

export class GffError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'GffError';
  }
}

/** Truncated or malformed input. */
export class GffParseError extends GffError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'GffParseError';
  }
}

/** An offset into an index array that is not 4-byte aligned. */
export class GffAlignmentError extends GffError {
  constructor(public readonly dataOrOffset: number, region: string = 'field indices') {
    super(`Offset ${dataOrOffset} into ${region} is not aligned on a 4-byte boundary`);
    this.name = 'GffAlignmentError';
  }
}

export class GffWriteError extends GffError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'GffWriteError';
  }
}

/** A string reference the string resolver does not know. */
export class GffLookupError extends GffError {
  constructor(public readonly stringRef: number, cause?: unknown) {
    super(`String reference ${stringRef} not found`, cause);
    this.name = 'GffLookupError';
  }
}

/** A typed accessor found a different field kind than it expected. */
export class GffFieldTypeError extends GffError {
  constructor(public readonly expected: string, public readonly found: string) {
    super(`Expected ${expected} but found ${found}`);
    this.name = 'GffFieldTypeError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
