import { z } from "zod";

/**
 * Upper bound on cells a decoder will allocate for one grid.
 * 2^28 cells is 2 GiB of float64 data.
 */
export const DEFAULT_MAX_CELLS = 2 ** 28;

export const ByteOrderSchema = z.enum(["little", "big"]);

export const WordSizeSchema = z.union([z.literal(32), z.literal(64)]);

export const CodecConfigSchema = z.object({
  byteOrder: ByteOrderSchema,
  wordSize: WordSizeSchema,
  maxCells: z
    .number()
    .int({ error: "maxCells must be an integer" })
    .positive({ error: "maxCells must be positive" })
    .max(Number.MAX_SAFE_INTEGER, { error: "maxCells must be a safe integer" }),
});

export type ValidatedCodecConfig = z.infer<typeof CodecConfigSchema>;
