/**
 * Byte stream capabilities consumed by the bit reader and writer.
 *
 * Every stream offers a required single-byte primitive. Bulk transfer and
 * finalization are optional extensions, detected once when a reader or
 * writer is constructed (see `capabilities.ts`).
 */

/** Smallest bit width accepted by `readBits` / `writeBits`. */
export const MIN_BIT_WIDTH = 1;

/** Largest bit width accepted by `readBits` / `writeBits`. */
export const MAX_BIT_WIDTH = 64;

/**
 * Outcome of a bulk transfer.
 *
 * On a short transfer both fields are meaningful: `bytes` counts what was
 * actually moved before `error` stopped the transfer.
 */
export interface TransferResult {
  /** Number of bytes transferred */
  bytes: number;
  /** Error that ended the transfer early, if any */
  error?: unknown;
}

/**
 * Required read capability.
 */
export interface ByteSource {
  /**
   * Returns the next byte (0-255), or `null` once the data is exhausted.
   * Any thrown value is reported to the caller as a stream error.
   */
  readByte(): number | null;
}

/**
 * Source that can also fill a buffer in one call.
 */
export interface BulkByteSource extends ByteSource {
  /**
   * Fills `target` from the start. May transfer fewer bytes than requested;
   * zero bytes without an error means end of data.
   */
  read(target: Uint8Array): TransferResult;
}

/**
 * Required write capability.
 */
export interface ByteSink {
  /** Accepts one byte (0-255). Throws when the byte cannot be written. */
  writeByte(byte: number): void;
}

/**
 * Sink that can also take a whole buffer in one call.
 */
export interface BulkByteSink extends ByteSink {
  write(data: Uint8Array): TransferResult;
}

/**
 * Sink with a finalization step, invoked by `BitWriter.close()`.
 */
export interface ClosableByteSink extends ByteSink {
  close(): void;
}

/**
 * Optional logger for debugging.
 */
export interface BitStreamLogger {
  debug?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}
