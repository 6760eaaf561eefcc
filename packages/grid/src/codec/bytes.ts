import { GridError, Result } from "@tessera/contracts";
import { BufferByteReader, BufferByteWriter } from "../io/buffer-stream";
import type { BinaryCodec } from "./types";

export function encodeToBytes<T>(codec: BinaryCodec<T>, value: T): Uint8Array {
  const writer = new BufferByteWriter();
  codec.encode(writer, value);
  return writer.toBytes();
}

/**
 * Decode one value that must span the whole of `bytes`.
 * @throws GridError STREAM_MALFORMED on trailing bytes
 */
export function decodeFromBytes<T>(
  codec: BinaryCodec<T>,
  bytes: Uint8Array,
): T {
  const reader = new BufferByteReader(bytes);
  const value = codec.decode(reader);
  if (reader.remaining > 0) {
    throw GridError.malformed(
      `${reader.remaining} trailing bytes after decoded value`,
      { trailing: reader.remaining, consumed: reader.position },
    );
  }
  return value;
}

/**
 * `decodeFromBytes` with decode failures returned as `Err`.
 * Errors other than GridError are rethrown.
 */
export function tryDecode<T>(
  codec: BinaryCodec<T>,
  bytes: Uint8Array,
): Result<T, GridError> {
  return Result.fromThrowable(
    () => decodeFromBytes(codec, bytes),
    (e) => {
      if (GridError.isGridError(e)) return e;
      throw e;
    },
  );
}
