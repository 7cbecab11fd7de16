import { InvalidBitWidthError } from "./errors.js";
import {
  type BulkByteSink,
  type BulkByteSource,
  type ByteSink,
  type ByteSource,
  type ClosableByteSink,
  MAX_BIT_WIDTH,
  MIN_BIT_WIDTH,
  type TransferResult,
} from "./types.js";

/**
 * Source capabilities resolved at construction time.
 */
export interface ResolvedByteSource {
  readByte(): number | null;
  /** Present only when the source offers bulk reads */
  readBulk?: (target: Uint8Array) => TransferResult;
}

/**
 * Sink capabilities resolved at construction time.
 */
export interface ResolvedByteSink {
  writeByte(byte: number): void;
  /** Present only when the sink offers bulk writes */
  writeBulk?: (data: Uint8Array) => TransferResult;
  /** Present only when the sink can be finalized */
  close?: () => void;
}

export function isBulkByteSource(source: ByteSource): source is BulkByteSource {
  return "read" in source && typeof source.read === "function";
}

export function isBulkByteSink(sink: ByteSink): sink is BulkByteSink {
  return "write" in sink && typeof sink.write === "function";
}

export function isClosableByteSink(sink: ByteSink): sink is ClosableByteSink {
  return "close" in sink && typeof sink.close === "function";
}

/**
 * Detect the optional bulk capability of a source once.
 *
 * @param source Source to wrap
 * @returns Bound capability table
 */
export function resolveByteSource(source: ByteSource): ResolvedByteSource {
  const resolved: ResolvedByteSource = {
    readByte: () => source.readByte(),
  };
  if (isBulkByteSource(source)) {
    resolved.readBulk = (target) => source.read(target);
  }
  return resolved;
}

/**
 * Detect the optional bulk and close capabilities of a sink once.
 *
 * @param sink Sink to wrap
 * @returns Bound capability table
 */
export function resolveByteSink(sink: ByteSink): ResolvedByteSink {
  const resolved: ResolvedByteSink = {
    writeByte: (byte) => sink.writeByte(byte),
  };
  if (isBulkByteSink(sink)) {
    resolved.writeBulk = (data) => sink.write(data);
  }
  if (isClosableByteSink(sink)) {
    resolved.close = () => sink.close();
  }
  return resolved;
}

/**
 * Throws unless `width` is an integer in [1, 64].
 */
export function checkBitWidth(width: number): void {
  if (!Number.isInteger(width) || width < MIN_BIT_WIDTH || width > MAX_BIT_WIDTH) {
    throw new InvalidBitWidthError(width);
  }
}
