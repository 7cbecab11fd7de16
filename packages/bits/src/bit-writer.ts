import { checkBitWidth, type ResolvedByteSink, resolveByteSink } from "./capabilities.js";
import { ShortWriteError, StreamClosedError } from "./errors.js";
import type { BitStreamLogger, ByteSink, TransferResult } from "./types.js";

/**
 * Options for BitWriter
 */
export interface BitWriterOptions {
  /** Receives close (debug) and sink failure (error) entries */
  logger?: BitStreamLogger;
  /**
   * Whether `close()` also closes a sink that supports it.
   * Default: true
   */
  closeSink?: boolean;
}

/**
 * Packs MSB-first bit fields into a byte sink.
 *
 * Bits are collected in a one-byte cache and handed to the sink as soon as
 * eight of them are available. `close()` must be called to emit the last,
 * zero-padded partial byte.
 *
 * The first sink failure is latched: every later operation that needs the
 * sink rethrows it, and `close()` reports it. Writes that only fill the cache
 * still succeed. Once closed, every operation throws `StreamClosedError`.
 */
export class BitWriter {
  private readonly sink: ResolvedByteSink;
  private readonly logger?: BitStreamLogger;
  private readonly closeSink: boolean;
  private cache = 0;
  private cachedBits = 0;
  private failure: { error: unknown } | undefined;
  private closed = false;

  constructor(sink: ByteSink, options: BitWriterOptions = {}) {
    this.sink = resolveByteSink(sink);
    this.logger = options.logger;
    this.closeSink = options.closeSink ?? true;
  }

  /** Whether the next write starts on a byte boundary */
  get isAligned(): boolean {
    return this.cachedBits === 0;
  }

  /**
   * Write the low `width` bits of `value`, most significant bit first.
   *
   * Bytes completed before a sink failure remain written.
   *
   * @param value Value to take the bits from; higher bits are ignored
   * @param width Number of bits, 1 to 64
   */
  writeBits(value: bigint | number, width: number): void {
    checkBitWidth(width);
    this.checkOpen();

    const bits = BigInt.asUintN(width, BigInt(value));
    let remaining = width;

    if (this.cachedBits > 0) {
      const free = 8 - this.cachedBits;
      if (remaining < free) {
        this.cache = (this.cache << remaining) | Number(bits);
        this.cachedBits += remaining;
        return;
      }
      remaining -= free;
      const b = (this.cache << free) | Number(bits >> BigInt(remaining));
      this.cache = 0;
      this.cachedBits = 0;
      this.push(b);
    }

    while (remaining >= 8) {
      remaining -= 8;
      this.push(Number((bits >> BigInt(remaining)) & 0xffn));
    }

    if (remaining > 0) {
      this.cache = Number(bits & ((1n << BigInt(remaining)) - 1n));
      this.cachedBits = remaining;
    }
  }

  writeBool(bit: boolean): void {
    this.writeBits(bit ? 1 : 0, 1);
  }

  /**
   * Write 8 bits.
   *
   * @param byte Value whose low 8 bits are written
   */
  writeByte(byte: number): void {
    this.checkOpen();
    const b = byte & 0xff;
    if (this.cachedBits === 0) {
      this.push(b);
      return;
    }
    const shift = this.cachedBits;
    const value = ((this.cache << (8 - shift)) | (b >> shift)) & 0xff;
    this.push(value);
    this.cache = b & ((1 << shift) - 1);
  }

  /**
   * Write all bytes of `data`.
   *
   * @returns Bytes written, and the first error encountered
   */
  write(data: Uint8Array): TransferResult {
    if (this.closed) {
      return { bytes: 0, error: new StreamClosedError("Bit writer is closed") };
    }
    if (this.failure) {
      return { bytes: 0, error: this.failure.error };
    }
    if (this.cachedBits === 0 && this.sink.writeBulk) {
      return this.writeAligned(data, this.sink.writeBulk);
    }
    for (let i = 0; i < data.length; i++) {
      try {
        this.writeByte(data[i]);
      } catch (error) {
        return { bytes: i, error };
      }
    }
    return { bytes: data.length };
  }

  /**
   * Zero-pad the cached bits to a full byte and flush it.
   * Writes nothing when already aligned.
   *
   * @returns Number of padding bits written (0-7)
   */
  align(): number {
    this.checkOpen();
    if (this.cachedBits === 0) {
      return 0;
    }
    const padding = 8 - this.cachedBits;
    const b = (this.cache << padding) & 0xff;
    this.cache = 0;
    this.cachedBits = 0;
    this.push(b);
    return padding;
  }

  /**
   * Flush the trailing partial byte, then close the sink when it supports it.
   *
   * A flush error is thrown in preference to a close error. The sink is closed
   * even when the flush fails.
   */
  close(): void {
    if (this.closed) {
      throw new StreamClosedError("Bit writer is already closed");
    }

    let flushFailure = this.failure;
    if (!flushFailure) {
      try {
        const padding = this.align();
        this.logger?.debug?.(`Bit writer closed with ${padding} padding bits`);
      } catch (error) {
        flushFailure = { error };
      }
    }
    this.closed = true;

    let closeFailure: { error: unknown } | undefined;
    if (this.closeSink && this.sink.close) {
      try {
        this.sink.close();
      } catch (error) {
        this.logger?.error?.("Bit writer sink failed to close:", error);
        closeFailure = { error };
      }
    }

    const failure = flushFailure ?? closeFailure;
    if (failure) {
      throw failure.error;
    }
  }

  private writeAligned(
    data: Uint8Array,
    writeBulk: (data: Uint8Array) => TransferResult,
  ): TransferResult {
    let result: TransferResult;
    try {
      result = writeBulk(data);
    } catch (error) {
      this.fail(error);
      return { bytes: 0, error };
    }
    if (result.error !== undefined) {
      this.fail(result.error);
      return result;
    }
    if (result.bytes < data.length) {
      const error = new ShortWriteError(result.bytes, data.length);
      this.fail(error);
      return { bytes: result.bytes, error };
    }
    return { bytes: result.bytes };
  }

  /** Hand one byte to the sink; latches and throws on failure. */
  private push(byte: number): void {
    if (this.failure) {
      throw this.failure.error;
    }
    try {
      this.sink.writeByte(byte);
    } catch (error) {
      this.fail(error);
      throw error;
    }
  }

  private fail(error: unknown): void {
    this.failure = { error };
    this.logger?.error?.("Bit writer sink failed:", error);
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StreamClosedError("Bit writer is closed");
    }
  }
}
