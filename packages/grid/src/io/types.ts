/**
 * Synchronous byte-stream abstraction consumed by every codec.
 *
 * Implementations never open or close the underlying resource; the caller
 * scopes it.
 */

export interface ByteReader {
  /**
   * Read exactly `length` bytes.
   * @throws GridError STREAM_UNEXPECTED_EOF when fewer bytes remain
   */
  readBytes(length: number): Uint8Array;
}

export interface ByteWriter {
  /**
   * @throws GridError STREAM_WRITE_FAILED when the sink rejects the write
   */
  writeBytes(bytes: Uint8Array): void;
}
