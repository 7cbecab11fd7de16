import { BitReader } from "./bit-reader.js";
import { BitWriter } from "./bit-writer.js";
import { ByteArraySink } from "./memory/byte-array-sink.js";
import { ByteArraySource } from "./memory/byte-array-source.js";

/**
 * A value and the number of bits it occupies in the stream.
 */
export interface BitField {
  value: bigint | number;
  width: number;
}

/**
 * Pack fields MSB-first into bytes. The last byte is zero-padded.
 *
 * @example
 * ```ts
 * packBits([{ value: 1, width: 1 }, { value: 0x7f, width: 7 }]); // Uint8Array [0xff]
 * ```
 */
export function packBits(fields: Iterable<BitField>): Uint8Array {
  const sink = new ByteArraySink();
  const writer = new BitWriter(sink);
  for (const { value, width } of fields) {
    writer.writeBits(value, width);
  }
  writer.close();
  return sink.toBytes();
}

/**
 * Read one value per width from `data`.
 *
 * Throws `EndOfStreamError` when the widths need more bits than `data` has.
 */
export function unpackBits(data: Uint8Array, widths: Iterable<number>): bigint[] {
  const reader = new BitReader(new ByteArraySource(data));
  const values: bigint[] = [];
  for (const width of widths) {
    values.push(reader.readBits(width));
  }
  return values;
}
