/**
 * @tessera/grid
 *
 * Fixed-size x-major 2D container with a length-prefixed binary codec.
 *
 * @example
 * ```typescript
 * import { Grid2D, codecs, gridCodec, encodeToBytes, decodeFromBytes } from "@tessera/grid";
 *
 * const heights = new Grid2D(4, 3, 0);
 * heights.set(2, 1, 12.5);
 *
 * const codec = gridCodec(codecs.f64);
 * const bytes = encodeToBytes(codec, heights);
 * const copy = decodeFromBytes(codec, bytes);
 * copy.get(2, 1); // 12.5
 * ```
 */

export * from "./codec";
export * from "./core";
export * from "./io";
