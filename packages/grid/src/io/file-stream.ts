/**
 * Synchronous byte streams over Node file descriptors, plus helpers that
 * scope a file around one codec call.
 */

import { closeSync, fstatSync, openSync, readSync, writeSync } from "node:fs";
import { GridError } from "@tessera/contracts";
import type { BinaryCodec } from "../codec/types";
import type { ByteReader, ByteWriter } from "./types";

const DEFAULT_CHUNK_SIZE = 64 * 1024;

const DEV_MODE = process.env.NODE_ENV !== "production";

function concatPieces(pieces: Uint8Array[], length: number): Uint8Array {
  const out = new Uint8Array(length);
  let offset = 0;
  for (const piece of pieces) {
    out.set(piece, offset);
    offset += piece.length;
  }
  return out;
}

/**
 * Buffered reader over an open descriptor. Does not close it.
 */
export class FileByteReader implements ByteReader {
  private readonly chunk: Uint8Array;
  private start = 0;
  private end = 0;
  private consumed = 0;

  constructor(
    private readonly fd: number,
    chunkSize: number = DEFAULT_CHUNK_SIZE,
  ) {
    this.chunk = new Uint8Array(Math.max(1, chunkSize));
  }

  /**
   * Bytes taken from the descriptor so far, including those drained by a
   * read that hit end of stream.
   */
  get position(): number {
    return this.consumed;
  }

  /**
   * The result is allocated only once all `length` bytes have arrived.
   */
  readBytes(length: number): Uint8Array {
    const pieces: Uint8Array[] = [];
    let filled = 0;

    while (filled < length) {
      if (this.start === this.end && !this.refill()) {
        this.consumed += filled;
        throw GridError.unexpectedEof(length, filled);
      }
      const take = Math.min(length - filled, this.end - this.start);
      pieces.push(this.chunk.slice(this.start, this.start + take));
      this.start += take;
      filled += take;
    }

    this.consumed += length;
    return pieces.length === 1 ? pieces[0] : concatPieces(pieces, length);
  }

  private refill(): boolean {
    let read: number;
    try {
      read = readSync(this.fd, this.chunk, 0, this.chunk.length, null);
    } catch (error) {
      throw GridError.readFailed(`Read from fd ${this.fd} failed`, error);
    }
    this.start = 0;
    this.end = read;
    return read > 0;
  }
}

/**
 * Buffered writer over an open descriptor. Call `flush()` before closing.
 */
export class FileByteWriter implements ByteWriter {
  private readonly chunk: Uint8Array;
  private used = 0;

  constructor(
    private readonly fd: number,
    chunkSize: number = DEFAULT_CHUNK_SIZE,
  ) {
    this.chunk = new Uint8Array(Math.max(1, chunkSize));
  }

  writeBytes(bytes: Uint8Array): void {
    if (bytes.length > this.chunk.length - this.used) {
      this.flush();
    }
    if (bytes.length >= this.chunk.length) {
      this.writeFully(bytes);
      return;
    }
    this.chunk.set(bytes, this.used);
    this.used += bytes.length;
  }

  flush(): void {
    if (this.used === 0) return;
    this.writeFully(this.chunk.subarray(0, this.used));
    this.used = 0;
  }

  private writeFully(bytes: Uint8Array): void {
    let offset = 0;
    try {
      while (offset < bytes.length) {
        offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
      }
    } catch (error) {
      throw GridError.writeFailed(`Write to fd ${this.fd} failed`, error);
    }
  }
}

// =============================================================================
// FILE HELPERS
// =============================================================================

function openFile(path: string, flags: "r" | "w"): number {
  try {
    return openSync(path, flags);
  } catch (error) {
    throw flags === "r"
      ? GridError.readFailed(`Cannot open ${path} for reading`, error)
      : GridError.writeFailed(`Cannot open ${path} for writing`, error);
  }
}

/**
 * Write `value` to `path`, replacing any existing file.
 */
export function saveToFile<T>(
  path: string,
  codec: BinaryCodec<T>,
  value: T,
): void {
  const fd = openFile(path, "w");
  try {
    const writer = new FileByteWriter(fd);
    codec.encode(writer, value);
    writer.flush();
  } finally {
    closeSync(fd);
  }
}

/**
 * Read one value from `path`. Bytes after the value are ignored with a
 * warning.
 */
export function loadFromFile<T>(path: string, codec: BinaryCodec<T>): T {
  const fd = openFile(path, "r");
  try {
    const reader = new FileByteReader(fd);
    const value = codec.decode(reader);
    const trailing = fstatSync(fd).size - reader.position;
    if (trailing > 0 && DEV_MODE) {
      console.warn(
        `[Grid IO] ${path}: ignoring ${trailing} trailing bytes after decoded value`,
      );
    }
    return value;
  } finally {
    closeSync(fd);
  }
}
