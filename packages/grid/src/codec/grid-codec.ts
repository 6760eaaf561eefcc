/**
 * Binary codec for Grid2D.
 *
 * Wire layout:
 * ```
 * [width: word][height: word][cell 0][cell 1]...[cell width*height-1]
 * ```
 * Cells follow storage order (x-major), each written by the element codec.
 * The word defaults to an unsigned little-endian 64-bit integer.
 */

import {
  buildCodecConfig,
  GridError,
  type BuildCodecConfigInput,
} from "@tessera/contracts";
import { Grid2D } from "../core/grid2d";
import { createPrimitiveCodecs } from "./primitives";
import type { BinaryCodec } from "./types";

export type GridCodecOptions = BuildCodecConfigInput;

/**
 * Lift an element codec to a codec for grids of that element.
 *
 * Decoding is not transactional: the first failing read aborts the whole
 * decode and the partially filled buffer is dropped.
 *
 * @throws GridError CONFIG_INVALID if `options` do not validate
 *
 * @example
 * ```typescript
 * const codec = gridCodec(codecs.f64);
 * const writer = new BufferByteWriter();
 * codec.encode(writer, heights);
 * const copy = codec.decode(new BufferByteReader(writer.toBytes()));
 * ```
 */
export function gridCodec<T>(
  element: BinaryCodec<T>,
  options: GridCodecOptions = {},
): BinaryCodec<Grid2D<T>> {
  const config = buildCodecConfig(options).getOrThrow();
  const word = createPrimitiveCodecs(config).usize;

  return {
    encode(writer, grid) {
      word.encode(writer, grid.width);
      word.encode(writer, grid.height);
      for (const value of grid.values()) {
        element.encode(writer, value);
      }
    },

    decode(reader) {
      const width = word.decode(reader);
      const height = word.decode(reader);
      const cells = width * height;

      if (!Number.isSafeInteger(cells) || cells > config.maxCells) {
        throw GridError.malformed(
          `Grid of ${width}x${height} exceeds the limit of ${config.maxCells} cells`,
          { width, height, maxCells: config.maxCells },
        );
      }

      const data = new Array<T>(cells);
      for (let i = 0; i < cells; i++) {
        data[i] = element.decode(reader);
      }
      return Grid2D.fromArray(width, height, data);
    },
  };
}
