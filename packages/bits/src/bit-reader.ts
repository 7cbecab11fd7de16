import { checkBitWidth, type ResolvedByteSource, resolveByteSource } from "./capabilities.js";
import { EndOfStreamError } from "./errors.js";
import type { BitStreamLogger, ByteSource, TransferResult } from "./types.js";

/**
 * Options for BitReader
 */
export interface BitReaderOptions {
  /** Receives end-of-data (debug) and source failure (error) entries */
  logger?: BitStreamLogger;
}

/**
 * Reads MSB-first bit fields from a byte source.
 *
 * Holds at most 7 unconsumed bits of the last byte pulled from the source.
 * The cached bits are kept right-justified in `cache`; the next bit delivered
 * is the highest of the `cachedBits` low bits.
 *
 * The first source failure (including end of data) is latched: every later
 * operation that needs the source rethrows that same error.
 *
 * @example
 * ```ts
 * const reader = new BitReader(new ByteArraySource(new Uint8Array([0xc1, 0x01])));
 * reader.readBool(); // true
 * reader.readByte(); // 0x82
 * ```
 */
export class BitReader {
  private readonly source: ResolvedByteSource;
  private readonly logger?: BitStreamLogger;
  private cache = 0;
  private cachedBits = 0;
  private failure: { error: unknown } | undefined;

  constructor(source: ByteSource, options: BitReaderOptions = {}) {
    this.source = resolveByteSource(source);
    this.logger = options.logger;
  }

  /** Whether the next read starts on a byte boundary */
  get isAligned(): boolean {
    return this.cachedBits === 0;
  }

  /**
   * Read `width` bits as an unsigned value, most significant bit first.
   *
   * All-or-nothing: when the source runs out part way no value is returned.
   *
   * @param width Number of bits, 1 to 64
   */
  readBits(width: number): bigint {
    checkBitWidth(width);

    if (width <= this.cachedBits) {
      const rest = this.cachedBits - width;
      const value = (this.cache >> rest) & ((1 << width) - 1);
      this.cache &= (1 << rest) - 1;
      this.cachedBits = rest;
      return BigInt(value);
    }

    let value = BigInt(this.cache);
    let remaining = width - this.cachedBits;
    while (remaining >= 8) {
      value = (value << 8n) | BigInt(this.pull());
      remaining -= 8;
    }

    let cache = 0;
    let cachedBits = 0;
    if (remaining > 0) {
      const b = this.pull();
      cachedBits = 8 - remaining;
      value = (value << BigInt(remaining)) | BigInt(b >> cachedBits);
      cache = b & ((1 << cachedBits) - 1);
    }

    this.cache = cache;
    this.cachedBits = cachedBits;
    return value;
  }

  readBool(): boolean {
    return this.readBits(1) === 1n;
  }

  /**
   * Read the next 8 bits as a byte.
   */
  readByte(): number {
    if (this.cachedBits === 0) {
      return this.pull();
    }
    return this.readUnalignedByte();
  }

  /**
   * Fill `target` with the next bytes of the stream.
   *
   * @returns Bytes filled, and the error that stopped the read early
   */
  read(target: Uint8Array): TransferResult {
    if (this.failure) {
      return { bytes: 0, error: this.failure.error };
    }
    if (this.cachedBits === 0 && this.source.readBulk) {
      return this.readAligned(target, this.source.readBulk);
    }
    for (let i = 0; i < target.length; i++) {
      try {
        target[i] = this.readByte();
      } catch (error) {
        return { bytes: i, error };
      }
    }
    return { bytes: target.length };
  }

  /**
   * Skip to the next byte boundary. Never touches the source.
   *
   * @returns Number of cached bits discarded (0-7)
   */
  align(): number {
    const skipped = this.cachedBits;
    this.cache = 0;
    this.cachedBits = 0;
    return skipped;
  }

  private readUnalignedByte(): number {
    const b = this.pull();
    const shift = this.cachedBits;
    const value = ((this.cache << (8 - shift)) | (b >> shift)) & 0xff;
    this.cache = b & ((1 << shift) - 1);
    return value;
  }

  private readAligned(
    target: Uint8Array,
    readBulk: (target: Uint8Array) => TransferResult,
  ): TransferResult {
    let filled = 0;
    while (filled < target.length) {
      let result: TransferResult;
      try {
        result = readBulk(target.subarray(filled));
      } catch (error) {
        this.fail(error);
        return { bytes: filled, error };
      }
      filled += result.bytes;
      if (result.error !== undefined) {
        this.fail(result.error);
        return { bytes: filled, error: result.error };
      }
      if (result.bytes === 0) {
        const error = new EndOfStreamError();
        this.fail(error);
        return { bytes: filled, error };
      }
    }
    return { bytes: filled };
  }

  /** Next byte from the source; latches and throws on failure. */
  private pull(): number {
    if (this.failure) {
      throw this.failure.error;
    }
    let b: number | null;
    try {
      b = this.source.readByte();
    } catch (error) {
      this.fail(error);
      throw error;
    }
    if (b === null) {
      const error = new EndOfStreamError();
      this.fail(error);
      throw error;
    }
    return b;
  }

  private fail(error: unknown): void {
    this.failure = { error };
    if (error instanceof EndOfStreamError) {
      this.logger?.debug?.("Bit reader reached end of data");
    } else {
      this.logger?.error?.("Bit reader source failed:", error);
    }
  }
}
