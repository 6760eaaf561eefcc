import {
  CodecConfigSchema,
  DEFAULT_MAX_CELLS,
  type ValidatedCodecConfig,
} from "../schemas/codec";
import type { CodecConfig } from "../types/codec";
import { GridError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export type BuildCodecConfigInput = Partial<CodecConfig>;

export const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = Object.freeze({
  byteOrder: "little",
  wordSize: 64,
  maxCells: DEFAULT_MAX_CELLS,
});

export function buildCodecConfig(
  input: BuildCodecConfigInput = {},
): Result<ValidatedCodecConfig, GridError> {
  const candidate = {
    byteOrder: input.byteOrder ?? DEFAULT_CODEC_CONFIG.byteOrder,
    wordSize: input.wordSize ?? DEFAULT_CODEC_CONFIG.wordSize,
    maxCells: input.maxCells ?? DEFAULT_CODEC_CONFIG.maxCells,
  };

  const parsed = CodecConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(
      GridError.configInvalid(issue?.message ?? "Invalid codec config", {
        path: issue?.path.map(String).join("."),
      }),
    );
  }
  return Ok(parsed.data);
}
