/**
 * Fixed-layout codecs for numbers, booleans, bigints and strings.
 */

import {
  DEFAULT_CODEC_CONFIG,
  GridError,
  type ByteOrder,
  type WordSize,
} from "@tessera/contracts";
import type { BinaryCodec } from "./types";

const UINT32_MAX = 0xffffffff;
const UINT64_MAX = (1n << 64n) - 1n;

export interface PrimitiveCodecOptions {
  readonly byteOrder?: ByteOrder;
  readonly wordSize?: WordSize;
}

export interface PrimitiveCodecs {
  readonly u8: BinaryCodec<number>;
  readonly i8: BinaryCodec<number>;
  readonly u16: BinaryCodec<number>;
  readonly i16: BinaryCodec<number>;
  readonly u32: BinaryCodec<number>;
  readonly i32: BinaryCodec<number>;
  /** Unsigned 64-bit integer limited to the safe-integer range. */
  readonly u64: BinaryCodec<number>;
  readonly bigU64: BinaryCodec<bigint>;
  readonly bigI64: BinaryCodec<bigint>;
  readonly f32: BinaryCodec<number>;
  readonly f64: BinaryCodec<number>;
  /** One byte, 0 or 1. */
  readonly bool: BinaryCodec<boolean>;
  /** u32 byte length followed by UTF-8 bytes. */
  readonly string: BinaryCodec<string>;
  /** Word-sized unsigned integer used for lengths and dimensions. */
  readonly usize: BinaryCodec<number>;
}

interface FixedLayout<T> {
  readonly name: string;
  readonly size: number;
  fits(value: T): boolean;
  write(view: DataView, value: T, littleEndian: boolean): void;
  read(view: DataView, littleEndian: boolean): T;
}

function fixedCodec<T>(
  layout: FixedLayout<T>,
  littleEndian: boolean,
): BinaryCodec<T> {
  return {
    encode(writer, value) {
      if (!layout.fits(value)) {
        throw GridError.malformed(
          `Value ${String(value)} does not fit in ${layout.name}`,
          { type: layout.name, value: String(value) },
        );
      }
      const bytes = new Uint8Array(layout.size);
      layout.write(new DataView(bytes.buffer), value, littleEndian);
      writer.writeBytes(bytes);
    },
    decode(reader) {
      const bytes = reader.readBytes(layout.size);
      const view = new DataView(bytes.buffer, bytes.byteOffset, layout.size);
      return layout.read(view, littleEndian);
    },
  };
}

function intRange(min: number, max: number): (value: number) => boolean {
  return (value) => Number.isInteger(value) && value >= min && value <= max;
}

const anyNumber = (value: number): boolean => typeof value === "number";

// =============================================================================
// LAYOUTS
// =============================================================================

const U8: FixedLayout<number> = {
  name: "u8",
  size: 1,
  fits: intRange(0, 0xff),
  write: (view, value) => view.setUint8(0, value),
  read: (view) => view.getUint8(0),
};

const I8: FixedLayout<number> = {
  name: "i8",
  size: 1,
  fits: intRange(-0x80, 0x7f),
  write: (view, value) => view.setInt8(0, value),
  read: (view) => view.getInt8(0),
};

const U16: FixedLayout<number> = {
  name: "u16",
  size: 2,
  fits: intRange(0, 0xffff),
  write: (view, value, le) => view.setUint16(0, value, le),
  read: (view, le) => view.getUint16(0, le),
};

const I16: FixedLayout<number> = {
  name: "i16",
  size: 2,
  fits: intRange(-0x8000, 0x7fff),
  write: (view, value, le) => view.setInt16(0, value, le),
  read: (view, le) => view.getInt16(0, le),
};

const U32: FixedLayout<number> = {
  name: "u32",
  size: 4,
  fits: intRange(0, UINT32_MAX),
  write: (view, value, le) => view.setUint32(0, value, le),
  read: (view, le) => view.getUint32(0, le),
};

const I32: FixedLayout<number> = {
  name: "i32",
  size: 4,
  fits: intRange(-0x80000000, 0x7fffffff),
  write: (view, value, le) => view.setInt32(0, value, le),
  read: (view, le) => view.getInt32(0, le),
};

const U64: FixedLayout<number> = {
  name: "u64",
  size: 8,
  fits: (value) => Number.isSafeInteger(value) && value >= 0,
  write: (view, value, le) => view.setBigUint64(0, BigInt(value), le),
  read: (view, le) => {
    const value = view.getBigUint64(0, le);
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw GridError.malformed(
        `u64 value ${value} exceeds Number.MAX_SAFE_INTEGER`,
        { type: "u64", value: value.toString() },
      );
    }
    return Number(value);
  },
};

const BIG_U64: FixedLayout<bigint> = {
  name: "u64",
  size: 8,
  fits: (value) => value >= 0n && value <= UINT64_MAX,
  write: (view, value, le) => view.setBigUint64(0, value, le),
  read: (view, le) => view.getBigUint64(0, le),
};

const BIG_I64: FixedLayout<bigint> = {
  name: "i64",
  size: 8,
  fits: (value) => BigInt.asIntN(64, value) === value,
  write: (view, value, le) => view.setBigInt64(0, value, le),
  read: (view, le) => view.getBigInt64(0, le),
};

const F32: FixedLayout<number> = {
  name: "f32",
  size: 4,
  fits: anyNumber,
  write: (view, value, le) => view.setFloat32(0, value, le),
  read: (view, le) => view.getFloat32(0, le),
};

const F64: FixedLayout<number> = {
  name: "f64",
  size: 8,
  fits: anyNumber,
  write: (view, value, le) => view.setFloat64(0, value, le),
  read: (view, le) => view.getFloat64(0, le),
};

const BOOL: FixedLayout<boolean> = {
  name: "bool",
  size: 1,
  fits: (value) => typeof value === "boolean",
  write: (view, value) => view.setUint8(0, value ? 1 : 0),
  read: (view) => {
    const byte = view.getUint8(0);
    if (byte > 1) {
      throw GridError.malformed(`Invalid bool byte ${byte}`, {
        type: "bool",
        value: String(byte),
      });
    }
    return byte === 1;
  },
};

// =============================================================================
// STRING
// =============================================================================

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

function stringCodec(length: BinaryCodec<number>): BinaryCodec<string> {
  return {
    encode(writer, value) {
      const bytes = textEncoder.encode(value);
      length.encode(writer, bytes.length);
      writer.writeBytes(bytes);
    },
    decode(reader) {
      const bytes = reader.readBytes(length.decode(reader));
      try {
        return textDecoder.decode(bytes);
      } catch (error) {
        throw new GridError(
          "STREAM_MALFORMED",
          "String is not valid UTF-8",
          { type: "string", length: bytes.length },
          { cause: error },
        );
      }
    },
  };
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Build the primitive codec set for one byte order and word size.
 *
 * @example
 * ```typescript
 * const be = createPrimitiveCodecs({ byteOrder: "big" });
 * be.u32.encode(writer, 1); // 00 00 00 01
 * ```
 */
export function createPrimitiveCodecs(
  options: PrimitiveCodecOptions = {},
): PrimitiveCodecs {
  const byteOrder = options.byteOrder ?? DEFAULT_CODEC_CONFIG.byteOrder;
  const wordSize = options.wordSize ?? DEFAULT_CODEC_CONFIG.wordSize;
  const le = byteOrder === "little";

  const u32 = fixedCodec(U32, le);
  const u64 = fixedCodec(U64, le);

  return Object.freeze({
    u8: fixedCodec(U8, le),
    i8: fixedCodec(I8, le),
    u16: fixedCodec(U16, le),
    i16: fixedCodec(I16, le),
    u32,
    i32: fixedCodec(I32, le),
    u64,
    bigU64: fixedCodec(BIG_U64, le),
    bigI64: fixedCodec(BIG_I64, le),
    f32: fixedCodec(F32, le),
    f64: fixedCodec(F64, le),
    bool: fixedCodec(BOOL, le),
    string: stringCodec(u32),
    usize: wordSize === 64 ? u64 : u32,
  });
}

/**
 * Little-endian codecs with a 64-bit word.
 */
export const codecs: PrimitiveCodecs = createPrimitiveCodecs();
