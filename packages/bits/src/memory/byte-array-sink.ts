import { BitStreamError, StreamClosedError } from "../errors.js";
import type { BulkByteSink, ClosableByteSink, TransferResult } from "../types.js";

/**
 * Options for ByteArraySink
 */
export interface ByteArraySinkOptions {
  /** Initial capacity in bytes. Default: 256 */
  initialCapacity?: number;
  /** Maximum number of bytes accepted, a non-negative integer. Default: unbounded */
  limit?: number;
}

/**
 * Growable in-memory byte sink.
 */
export class ByteArraySink implements BulkByteSink, ClosableByteSink {
  private buffer: Uint8Array;
  private length = 0;
  private readonly limit: number;
  private isClosed = false;

  constructor(options: ByteArraySinkOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialCapacity ?? 256));
    this.limit = options.limit ?? Number.POSITIVE_INFINITY;
    if (this.limit !== Number.POSITIVE_INFINITY && !(Number.isInteger(this.limit) && this.limit >= 0)) {
      throw new RangeError(`Invalid byte array sink limit: ${this.limit}`);
    }
  }

  /** Number of bytes written so far */
  get size(): number {
    return this.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  writeByte(byte: number): void {
    this.checkOpen();
    if (this.length >= this.limit) {
      throw new BitStreamError(`Byte array sink is full (${this.limit} bytes)`);
    }
    this.ensureCapacity(this.length + 1);
    this.buffer[this.length++] = byte & 0xff;
  }

  write(data: Uint8Array): TransferResult {
    this.checkOpen();
    const n = Math.min(data.length, this.limit - this.length);
    this.ensureCapacity(this.length + n);
    this.buffer.set(data.subarray(0, n), this.length);
    this.length += n;
    if (n < data.length) {
      return { bytes: n, error: new BitStreamError(`Byte array sink is full (${this.limit} bytes)`) };
    }
    return { bytes: n };
  }

  close(): void {
    this.isClosed = true;
  }

  /** Copy of everything written so far */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }

  private checkOpen(): void {
    if (this.isClosed) {
      throw new StreamClosedError("Byte array sink is closed");
    }
  }
}
