import { describe, expect, it } from "vitest";
import { ByteArraySource } from "../../src/memory/byte-array-source.js";

describe("ByteArraySource", () => {
  it("yields bytes then null", () => {
    const source = new ByteArraySource(new Uint8Array([7, 8]));
    expect(source.readByte()).toBe(7);
    expect(source.remaining).toBe(1);
    expect(source.readByte()).toBe(8);
    expect(source.readByte()).toBeNull();
    expect(source.remaining).toBe(0);
  });

  it("fills as much of the target as it can", () => {
    const source = new ByteArraySource(new Uint8Array([1, 2, 3]));
    const target = new Uint8Array(2);
    expect(source.read(target)).toEqual({ bytes: 2 });
    expect(Array.from(target)).toEqual([1, 2]);
    expect(source.read(target)).toEqual({ bytes: 1 });
    expect(target[0]).toBe(3);
    expect(source.read(target)).toEqual({ bytes: 0 });
  });
});
