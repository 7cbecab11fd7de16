import { closeSync, openSync, readSync } from "node:fs";
import type { BulkByteSource, TransferResult } from "@bitcodec/bits";

/**
 * Options for FileByteSource
 */
export interface FileByteSourceOptions {
  /** Read-ahead buffer size in bytes. Default: 65536 */
  bufferSize?: number;
  /** Whether `close()` closes the descriptor. Default: false */
  ownsDescriptor?: boolean;
}

/**
 * Synchronous byte source over a file descriptor.
 *
 * Single-byte reads are served from a read-ahead buffer; bulk reads drain the
 * buffer first and then read straight into the caller's array.
 */
export class FileByteSource implements BulkByteSource {
  private readonly buffer: Uint8Array;
  private readonly ownsDescriptor: boolean;
  private start = 0;
  private end = 0;
  private released = false;

  constructor(
    private readonly fd: number,
    options: FileByteSourceOptions = {},
  ) {
    this.buffer = new Uint8Array(Math.max(1, options.bufferSize ?? 65536));
    this.ownsDescriptor = options.ownsDescriptor ?? false;
  }

  /**
   * Open `path` for reading. The returned source owns the descriptor.
   */
  static open(path: string, options: Omit<FileByteSourceOptions, "ownsDescriptor"> = {}) {
    return new FileByteSource(openSync(path, "r"), { ...options, ownsDescriptor: true });
  }

  readByte(): number | null {
    if (this.start === this.end && !this.fill()) {
      return null;
    }
    return this.buffer[this.start++];
  }

  read(target: Uint8Array): TransferResult {
    const buffered = Math.min(target.length, this.end - this.start);
    if (buffered > 0) {
      target.set(this.buffer.subarray(this.start, this.start + buffered));
      this.start += buffered;
      return { bytes: buffered };
    }
    if (target.length === 0) {
      return { bytes: 0 };
    }
    return { bytes: readSync(this.fd, target, 0, target.length, null) };
  }

  /** Release the descriptor when this source owns it. */
  close(): void {
    if (this.released) return;
    this.released = true;
    if (this.ownsDescriptor) {
      closeSync(this.fd);
    }
  }

  private fill(): boolean {
    this.start = 0;
    this.end = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    return this.end > 0;
  }
}
