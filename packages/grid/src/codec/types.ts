import type { ByteReader, ByteWriter } from "../io/types";

/**
 * Read-one/write-one codec for values of type T.
 *
 * Codecs compose: a codec for a container is built from the codec of its
 * elements, so any type with a `BinaryCodec` can be stored in a grid and
 * serialized with it.
 *
 * Round-trip law: `decode` applied to the bytes written by `encode(value)`
 * yields a value equal to `value`.
 */
export interface BinaryCodec<T> {
  decode(reader: ByteReader): T;
  encode(writer: ByteWriter, value: T): void;
}
