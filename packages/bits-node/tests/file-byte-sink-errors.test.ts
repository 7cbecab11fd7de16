import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileByteSink } from "../src/file-byte-sink.js";

/** Limits on the mocked descriptor calls. */
const disk = vi.hoisted(() => ({
  /** Bytes the device accepts before failing */
  capacity: Number.POSITIVE_INFINITY,
  /** Largest chunk written by one call */
  chunk: 4,
  written: 0,
  failClose: false,
}));

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    writeSync: (fd: number, data: Uint8Array, offset = 0, length = data.length - offset) => {
      if (disk.written >= disk.capacity) {
        throw new Error("ENOSPC: no space left on device");
      }
      const n = Math.min(length, disk.chunk, disk.capacity - disk.written);
      const done = actual.writeSync(fd, data, offset, n);
      disk.written += done;
      return done;
    },
    closeSync: (fd: number) => {
      actual.closeSync(fd);
      if (disk.failClose) {
        throw new Error("EIO: close failed");
      }
    },
  };
});

describe("FileByteSink failures", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bitcodec-"));
    disk.capacity = Number.POSITIVE_INFINITY;
    disk.chunk = 4;
    disk.written = 0;
    disk.failClose = false;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("counts the bytes written before a direct write fails", () => {
    const path = join(dir, "out.bin");
    const sink = FileByteSink.open(path, { bufferSize: 3 });
    disk.capacity = 4;

    const result = sink.write(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
    expect(result.bytes).toBe(4);
    expect(result.error).toEqual(new Error("ENOSPC: no space left on device"));

    sink.close();
    expect(Array.from(readFileSync(path))).toEqual([1, 2, 3, 4]);
  });

  it("keeps unwritten buffered bytes for the next flush", () => {
    const path = join(dir, "out.bin");
    const sink = FileByteSink.open(path, { bufferSize: 8 });
    for (let b = 1; b <= 5; b++) {
      sink.writeByte(b);
    }
    disk.capacity = 2;
    expect(() => sink.flush()).toThrow("ENOSPC");

    disk.capacity = Number.POSITIVE_INFINITY;
    sink.flush();
    sink.close();
    expect(Array.from(readFileSync(path))).toEqual([1, 2, 3, 4, 5]);
  });

  it("reports the flush error over the close error", () => {
    const path = join(dir, "out.bin");
    const sink = FileByteSink.open(path);
    sink.writeByte(1);
    disk.capacity = 0;
    disk.failClose = true;

    expect(() => sink.close()).toThrow("ENOSPC: no space left on device");
  });

  it("reports a close error after a clean flush", () => {
    const sink = FileByteSink.open(join(dir, "out.bin"));
    sink.writeByte(1);
    disk.failClose = true;

    expect(() => sink.close()).toThrow("EIO: close failed");
  });
});
