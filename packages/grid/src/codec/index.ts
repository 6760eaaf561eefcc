/**
 * Codec module - binary encode/decode for primitives and grids.
 */

export { decodeFromBytes, encodeToBytes, tryDecode } from "./bytes";
export { gridCodec, type GridCodecOptions } from "./grid-codec";
export {
  codecs,
  createPrimitiveCodecs,
  type PrimitiveCodecOptions,
  type PrimitiveCodecs,
} from "./primitives";
export type { BinaryCodec } from "./types";
