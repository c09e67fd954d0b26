/**
 * Base error class for WKB errors.
 */
export class WkbError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WkbError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends WkbError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the buffer is exhausted during decoding.
 */
export class UnexpectedEndOfInputError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`);
    this.name = "UnexpectedEndOfInputError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a byte order marker is neither 0 nor 1.
 */
export class InvalidByteOrderError extends DecodeError {
  readonly marker: number;

  constructor(marker: number) {
    super(`Invalid byte order marker: ${marker}`);
    this.name = "InvalidByteOrderError";
    this.marker = marker;
  }
}

/**
 * Error thrown when a type code (flags cleared) is not a known geometry.
 */
export class UnsupportedTypeError extends DecodeError {
  readonly typeCode: number;

  constructor(typeCode: number) {
    super(`Unsupported WKB type "${typeCode}"`);
    this.name = "UnsupportedTypeError";
    this.typeCode = typeCode;
  }
}

/**
 * Error thrown when a multi-geometry member has the wrong type.
 */
export class UnexpectedGeometryTypeError extends DecodeError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Unexpected geometry type: expected ${expected}, got ${actual}`);
    this.name = "UnexpectedGeometryTypeError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when nested geometries exceed the configured depth.
 */
export class NestingDepthExceededError extends DecodeError {
  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super(`Geometry nesting exceeds maximum depth of ${maxDepth}`);
    this.name = "NestingDepthExceededError";
    this.maxDepth = maxDepth;
  }
}

/**
 * Error thrown when hex input cannot be decoded.
 */
export class InvalidHexError extends DecodeError {
  constructor(reason: string) {
    super(`Invalid hex input: ${reason}`);
    this.name = "InvalidHexError";
  }
}
