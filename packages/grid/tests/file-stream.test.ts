/**
 * File-backed stream tests. Each test works in its own temp directory.
 */

import { closeSync, mkdtempSync, openSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GridError } from "@tessera/contracts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { codecs, encodeToBytes, gridCodec } from "../src/codec";
import { Grid2D } from "../src/core";
import { FileByteReader, FileByteWriter, loadFromFile, saveToFile } from "../src/io";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "tessera-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("saveToFile / loadFromFile", () => {
  it("round-trips a grid through a file", () => {
    const path = join(dir, "heights.bin");
    const codec = gridCodec(codecs.f64);
    const grid = Grid2D.generate(10, 2, (x, y) => x / 4 + y);

    saveToFile(path, codec, grid);
    const copy = loadFromFile(path, codec);

    expect(copy.equals(grid)).toBe(true);
    expect(readFileSync(path)).toHaveLength(16 + 20 * 8);
  });

  it("writes exactly the in-memory encoding", () => {
    const path = join(dir, "cells.bin");
    const codec = gridCodec(codecs.u8);
    const grid = Grid2D.generate(3, 2, (x, y) => x * 10 + y);

    saveToFile(path, codec, grid);

    expect([...readFileSync(path)]).toEqual([...encodeToBytes(codec, grid)]);
  });

  it("warns about trailing bytes", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(dir, "padded.bin");
    const codec = gridCodec(codecs.u8);
    const bytes = encodeToBytes(codec, new Grid2D(1, 1, 4));
    writeFileSync(path, new Uint8Array([...bytes, 1, 2, 3]));

    const grid = loadFromFile(path, codec);

    expect(grid.get(0, 0)).toBe(4);
    expect(warn).toHaveBeenCalledWith(
      `[Grid IO] ${path}: ignoring 3 trailing bytes after decoded value`,
    );
  });

  it("does not warn when the file is fully consumed", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(dir, "exact.bin");
    const codec = gridCodec(codecs.u8);
    saveToFile(path, codec, new Grid2D(2, 2, 1));

    loadFromFile(path, codec);

    expect(warn).not.toHaveBeenCalled();
  });

  it("reports a missing file as a read failure", () => {
    expect.assertions(2);
    try {
      loadFromFile(join(dir, "missing.bin"), codecs.u8);
    } catch (error) {
      expect(GridError.isGridError(error)).toBe(true);
      expect(GridError.isGridError(error) && error.code).toBe("STREAM_READ_FAILED");
    }
  });

  it("reports a truncated file as end of stream", () => {
    const path = join(dir, "short.bin");
    writeFileSync(path, new Uint8Array([2, 0, 0, 0, 0, 0, 0, 0]));
    expect(() => loadFromFile(path, gridCodec(codecs.u8))).toThrow(
      "Unexpected end of stream: needed 8 bytes, 0 available",
    );
  });

  it("reports an oversized string length as end of stream without reserving it", () => {
    const path = join(dir, "huge-string.bin");
    const header = encodeToBytes(codecs.u64, 1);
    writeFileSync(path, new Uint8Array([...header, ...header, 0xff, 0xff, 0xff, 0xff]));
    const before = process.memoryUsage().arrayBuffers;

    expect(() => loadFromFile(path, gridCodec(codecs.string))).toThrow(
      "Unexpected end of stream: needed 4294967295 bytes, 0 available",
    );
    expect(process.memoryUsage().arrayBuffers - before).toBeLessThan(64 * 1024 * 1024);
  });
});

describe("FileByteReader", () => {
  it("reads across chunk boundaries", () => {
    const path = join(dir, "data.bin");
    writeFileSync(path, new Uint8Array([1, 2, 3, 4, 5, 6, 7]));
    const fd = openSync(path, "r");
    try {
      const reader = new FileByteReader(fd, 3);
      expect([...reader.readBytes(2)]).toEqual([1, 2]);
      expect([...reader.readBytes(4)]).toEqual([3, 4, 5, 6]);
      expect(reader.position).toBe(6);
      expect(() => reader.readBytes(2)).toThrow(
        "Unexpected end of stream: needed 2 bytes, 1 available",
      );
      expect(reader.position).toBe(7);
    } finally {
      closeSync(fd);
    }
  });
});

describe("FileByteWriter", () => {
  it("buffers small writes and passes large ones through", () => {
    const path = join(dir, "out.bin");
    const fd = openSync(path, "w");
    try {
      const writer = new FileByteWriter(fd, 4);
      writer.writeBytes(new Uint8Array([1, 2]));
      writer.writeBytes(new Uint8Array([3, 4, 5, 6, 7, 8]));
      writer.writeBytes(new Uint8Array([9]));
      writer.flush();
    } finally {
      closeSync(fd);
    }
    expect([...readFileSync(path)]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("wraps descriptor errors", () => {
    const path = join(dir, "ro.bin");
    writeFileSync(path, new Uint8Array(0));
    const fd = openSync(path, "r");
    try {
      const writer = new FileByteWriter(fd, 1);
      expect(() => writer.writeBytes(new Uint8Array([1, 2]))).toThrow(
        `Write to fd ${fd} failed`,
      );
    } finally {
      closeSync(fd);
    }
  });
});
