/**
 * Bit stream error classes.
 */

/**
 * Base error for all bit stream operations.
 */
export class BitStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BitStreamError";
  }
}

/**
 * The byte source has no more data.
 */
export class EndOfStreamError extends BitStreamError {
  constructor(message = "Unexpected end of stream") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Requested bit width is not an integer in [1, 64].
 */
export class InvalidBitWidthError extends BitStreamError {
  constructor(public readonly width: number) {
    super(`Invalid bit width: ${width} (expected an integer from 1 to 64)`);
    this.name = "InvalidBitWidthError";
  }
}

/**
 * Operation attempted on a stream that has already been closed.
 */
export class StreamClosedError extends BitStreamError {
  constructor(message = "Stream is closed") {
    super(message);
    this.name = "StreamClosedError";
  }
}

/**
 * A bulk sink accepted fewer bytes than it was given without reporting why.
 */
export class ShortWriteError extends BitStreamError {
  constructor(
    public readonly written: number,
    public readonly expected: number,
  ) {
    super(`Short write: ${written} of ${expected} bytes accepted`);
    this.name = "ShortWriteError";
  }
}
