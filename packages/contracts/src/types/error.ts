/**
 * Error codes for grid and codec operations.
 * Using discriminated union for type-safe error handling.
 */
export type GridErrorCode =
  | "INDEX_OUT_OF_BOUNDS"
  | "INVALID_DIMENSIONS"
  | "CONFIG_INVALID"
  | "STREAM_UNEXPECTED_EOF"
  | "STREAM_MALFORMED"
  | "STREAM_READ_FAILED"
  | "STREAM_WRITE_FAILED";

/**
 * Unified error type for grid access and binary (de)serialization.
 *
 * @example
 * ```typescript
 * throw GridError.indexOutOfBounds(3, 2, 3, 0);
 * // index out of bounds: the len is (3, 2) but the index is (3, 0)
 * ```
 */
export class GridError extends Error {
  readonly name = "GridError";

  constructor(
    public readonly code: GridErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridError);
    }
  }

  static create(
    code: GridErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError(code, message, details);
  }

  /**
   * Create an out-of-bounds error naming the grid dimensions and the
   * offending coordinate.
   */
  static indexOutOfBounds(
    width: number,
    height: number,
    x: number,
    y: number,
  ): GridError {
    return new GridError(
      "INDEX_OUT_OF_BOUNDS",
      `index out of bounds: the len is (${width}, ${height}) but the index is (${x}, ${y})`,
      { width, height, x, y },
    );
  }

  static invalidDimensions(width: number, height: number): GridError {
    return new GridError(
      "INVALID_DIMENSIONS",
      `Invalid grid dimensions: ${width}x${height}`,
      { width, height },
    );
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("CONFIG_INVALID", message, details);
  }

  /**
   * Create an end-of-stream error for a read that could not be satisfied.
   */
  static unexpectedEof(requested: number, available: number): GridError {
    return new GridError(
      "STREAM_UNEXPECTED_EOF",
      `Unexpected end of stream: needed ${requested} bytes, ${available} available`,
      { requested, available },
    );
  }

  static malformed(
    message: string,
    details?: Record<string, unknown>,
  ): GridError {
    return new GridError("STREAM_MALFORMED", message, details);
  }

  static readFailed(message: string, cause?: unknown): GridError {
    return new GridError("STREAM_READ_FAILED", message, undefined, {
      cause,
    });
  }

  static writeFailed(message: string, cause?: unknown): GridError {
    return new GridError("STREAM_WRITE_FAILED", message, undefined, {
      cause,
    });
  }

  /**
   * Check if an unknown error is a GridError.
   */
  static isGridError(error: unknown): error is GridError {
    return error instanceof GridError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: GridErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
