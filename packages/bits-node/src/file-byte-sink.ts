import { closeSync, openSync, writeSync } from "node:fs";
import {
  type BulkByteSink,
  type ClosableByteSink,
  StreamClosedError,
  type TransferResult,
} from "@bitcodec/bits";

/**
 * Options for FileByteSink
 */
export interface FileByteSinkOptions {
  /** Write-behind buffer size in bytes. Default: 65536 */
  bufferSize?: number;
  /** Whether `close()` closes the descriptor. Default: false */
  ownsDescriptor?: boolean;
}

/**
 * Synchronous byte sink over a file descriptor.
 *
 * Bytes are collected in a buffer and written with `fs.writeSync` when it
 * fills up, on `flush()` and on `close()`.
 */
export class FileByteSink implements BulkByteSink, ClosableByteSink {
  private readonly buffer: Uint8Array;
  private readonly ownsDescriptor: boolean;
  private length = 0;
  private closed = false;

  constructor(
    private readonly fd: number,
    options: FileByteSinkOptions = {},
  ) {
    this.buffer = new Uint8Array(Math.max(1, options.bufferSize ?? 65536));
    this.ownsDescriptor = options.ownsDescriptor ?? false;
  }

  /**
   * Create or truncate `path` for writing. The returned sink owns the descriptor.
   */
  static open(path: string, options: Omit<FileByteSinkOptions, "ownsDescriptor"> = {}) {
    return new FileByteSink(openSync(path, "w"), { ...options, ownsDescriptor: true });
  }

  writeByte(byte: number): void {
    this.checkOpen();
    if (this.length === this.buffer.length) {
      this.flush();
    }
    this.buffer[this.length++] = byte & 0xff;
  }

  write(data: Uint8Array): TransferResult {
    this.checkOpen();
    if (this.length + data.length <= this.buffer.length) {
      this.buffer.set(data, this.length);
      this.length += data.length;
      return { bytes: data.length };
    }
    try {
      this.flush();
    } catch (error) {
      return { bytes: 0, error };
    }
    return writeFully(this.fd, data);
  }

  /**
   * Write buffered bytes to the descriptor.
   * Bytes not written before a failure stay buffered for the next flush.
   */
  flush(): void {
    this.checkOpen();
    const result = writeFully(this.fd, this.buffer.subarray(0, this.length));
    this.buffer.copyWithin(0, result.bytes, this.length);
    this.length -= result.bytes;
    if (result.error !== undefined) {
      throw result.error;
    }
  }

  /**
   * Flush and, when this sink owns the descriptor, close it.
   * A flush error is thrown in preference to a close error.
   */
  close(): void {
    if (this.closed) return;
    let flushFailure: { error: unknown } | undefined;
    try {
      this.flush();
    } catch (error) {
      flushFailure = { error };
    }
    this.closed = true;

    let closeFailure: { error: unknown } | undefined;
    if (this.ownsDescriptor) {
      try {
        closeSync(this.fd);
      } catch (error) {
        closeFailure = { error };
      }
    }

    const failure = flushFailure ?? closeFailure;
    if (failure) {
      throw failure.error;
    }
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StreamClosedError("File sink is closed");
    }
  }
}

function writeFully(fd: number, data: Uint8Array): TransferResult {
  let offset = 0;
  try {
    while (offset < data.length) {
      offset += writeSync(fd, data, offset, data.length - offset);
    }
  } catch (error) {
    return { bytes: offset, error };
  }
  return { bytes: offset };
}
