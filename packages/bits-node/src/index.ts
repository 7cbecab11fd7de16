/**
 * Node.js file descriptor streams for @bitcodec/bits
 *
 * @example
 * ```ts
 * import { BitWriter } from "@bitcodec/bits";
 * import { FileByteSink } from "@bitcodec/bits-node";
 *
 * const writer = new BitWriter(FileByteSink.open("/tmp/out.bin"));
 * writer.writeBits(0x1f, 5);
 * writer.close(); // pads, flushes and closes the file
 * ```
 *
 * @packageDocumentation
 */

export * from "./file-byte-sink.js";
export * from "./file-byte-source.js";
