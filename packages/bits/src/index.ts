/**
 * MSB-first bit stream reader and writer over pluggable byte streams.
 *
 * @example
 * ```ts
 * import { BitWriter, ByteArraySink } from "@bitcodec/bits";
 *
 * const sink = new ByteArraySink();
 * const writer = new BitWriter(sink);
 * writer.writeBits(0x5, 3);
 * writer.writeBool(true);
 * writer.close();
 * sink.toBytes(); // Uint8Array [0xb0]
 * ```
 *
 * @packageDocumentation
 */

export * from "./bit-reader.js";
export * from "./bit-writer.js";
export * from "./capabilities.js";
export * from "./errors.js";
export * from "./fields.js";
export * from "./memory/index.js";
export * from "./types.js";
