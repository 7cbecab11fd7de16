import type { BulkByteSource, TransferResult } from "../types.js";

/**
 * Byte source over an in-memory array.
 */
export class ByteArraySource implements BulkByteSource {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  /** Bytes not yet read */
  get remaining(): number {
    return this.data.length - this.offset;
  }

  readByte(): number | null {
    if (this.offset >= this.data.length) {
      return null;
    }
    return this.data[this.offset++];
  }

  read(target: Uint8Array): TransferResult {
    const n = Math.min(target.length, this.remaining);
    target.set(this.data.subarray(this.offset, this.offset + n));
    this.offset += n;
    return { bytes: n };
  }
}
