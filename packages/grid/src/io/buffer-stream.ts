/**
 * In-memory byte streams over Uint8Array.
 */

import { GridError } from "@tessera/contracts";
import type { ByteReader, ByteWriter } from "./types";

const INITIAL_CAPACITY = 64;

/**
 * Cursor over a byte array. Returned slices are views, not copies.
 */
export class BufferByteReader implements ByteReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  readBytes(length: number): Uint8Array {
    if (length > this.remaining) {
      throw GridError.unexpectedEof(length, this.remaining);
    }
    const out = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }
}

/**
 * Growable in-memory sink. Capacity doubles as bytes are written.
 */
export class BufferByteWriter implements ByteWriter {
  private buffer: Uint8Array;
  private used = 0;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.used;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(this.used + bytes.length);
    this.buffer.set(bytes, this.used);
    this.used += bytes.length;
  }

  /**
   * Copy of everything written so far.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.used);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.used));
    this.buffer = next;
  }
}
