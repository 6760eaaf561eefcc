export type ByteOrder = "little" | "big";

/**
 * Width in bits of the unsigned integer that carries grid dimensions
 * on the wire.
 */
export type WordSize = 32 | 64;

export interface CodecConfig {
  byteOrder: ByteOrder;
  wordSize: WordSize;
  maxCells: number;
}
