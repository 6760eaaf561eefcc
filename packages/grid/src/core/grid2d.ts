/**
 * Fixed-size 2D container over one contiguous, sealed array.
 *
 * Layout is x-major: cell (x, y) lives at offset `x * height + y`, so all
 * cells of one column are adjacent.
 */

import { GridError } from "@tessera/contracts";
import type {
  Cloner,
  Dimensions,
  GridCell,
  GridEntry,
  MutableGrid2D,
  Point,
} from "./types";

const identity = <T>(value: T): T => value;

function isDimension(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * 2D grid with bounds-checked cell access.
 *
 * @remarks
 * The element array is sealed at construction, so its length can never
 * change. Mutation happens only through `set`, `setAt`, `fill` and the
 * handles yielded by `cells()`.
 */
export class Grid2D<T> implements MutableGrid2D<T> {
  private w: number;
  private h: number;
  private data: T[];

  /**
   * @param fill - Value every cell starts as
   * @param clone - Duplicates `fill` for each cell; identity by default
   */
  constructor(
    width: number,
    height: number,
    fill: T,
    clone: Cloner<T> = identity,
  ) {
    Grid2D.assertDimensions(width, height);

    this.w = width;
    this.h = height;

    const size = width * height;
    const data = new Array<T>(size);
    for (let i = 0; i < size; i++) {
      data[i] = clone(fill);
    }
    this.data = Object.seal(data);
  }

  /**
   * Build a grid by computing each cell from its coordinates.
   * Cells are visited in x-major order.
   */
  static generate<T>(
    width: number,
    height: number,
    fn: (x: number, y: number) => T,
  ): Grid2D<T> {
    Grid2D.assertDimensions(width, height);
    const data = new Array<T>(width * height);
    for (let x = 0; x < width; x++) {
      for (let y = 0; y < height; y++) {
        data[x * height + y] = fn(x, y);
      }
    }
    return Grid2D.fromArray(width, height, data);
  }

  /**
   * Adopt an array already laid out in x-major order.
   * The array is sealed and owned by the grid afterwards.
   *
   * @internal Used by the codec and by `generate`/`map`.
   */
  static fromArray<T>(width: number, height: number, data: T[]): Grid2D<T> {
    Grid2D.assertDimensions(width, height);
    if (data.length !== width * height) {
      throw GridError.invalidDimensions(width, height);
    }
    // An empty grid never calls its fill, so it can take over `data` as is.
    const grid = new Grid2D<T>(0, 0, data[0]);
    grid.w = width;
    grid.h = height;
    grid.data = Object.seal(data);
    return grid;
  }

  private static assertDimensions(width: number, height: number): void {
    if (
      !isDimension(width) ||
      !isDimension(height) ||
      !Number.isSafeInteger(width * height)
    ) {
      throw GridError.invalidDimensions(width, height);
    }
  }

  /** Number of columns */
  get width(): number {
    return this.w;
  }

  /** Number of rows */
  get height(): number {
    return this.h;
  }

  /** Total cell count (width * height) */
  get size(): number {
    return this.data.length;
  }

  /** Get grid dimensions */
  getDimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  /** Check if integer coordinates are within bounds */
  isInBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  /**
   * Shared by every indexed read and write.
   * @throws GridError INDEX_OUT_OF_BOUNDS
   */
  private offsetOf(x: number, y: number): number {
    if (!this.isInBounds(x, y)) {
      throw GridError.indexOutOfBounds(this.width, this.height, x, y);
    }
    return x * this.height + y;
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /** Get cell value at coordinates */
  get(x: number, y: number): T {
    return this.data[this.offsetOf(x, y)];
  }

  /** Get cell value at point */
  getAt(p: Point): T {
    return this.get(p.x, p.y);
  }

  /** Set cell value at coordinates */
  set(x: number, y: number, value: T): void {
    this.data[this.offsetOf(x, y)] = value;
  }

  /** Set cell value at point */
  setAt(p: Point, value: T): void {
    this.set(p.x, p.y, value);
  }

  /**
   * Overwrite every cell with `value`.
   */
  fill(value: T, clone: Cloner<T> = identity): void {
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] = clone(value);
    }
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  /**
   * Iterate `[x, y, value]` in storage order (all y for x = 0, then x = 1, ...).
   */
  *entries(): Generator<GridEntry<T>> {
    const { data, height } = this;
    for (let i = 0; i < data.length; i++) {
      yield [Math.floor(i / height), i % height, data[i]];
    }
  }

  [Symbol.iterator](): Generator<GridEntry<T>> {
    return this.entries();
  }

  *values(): Generator<T> {
    for (let i = 0; i < this.data.length; i++) {
      yield this.data[i];
    }
  }

  /**
   * Iterate writable cell handles in storage order.
   * Each handle reads and writes through to the grid.
   */
  *cells(): Generator<GridCell<T>> {
    const { data, height } = this;
    for (let i = 0; i < data.length; i++) {
      yield {
        x: Math.floor(i / height),
        y: i % height,
        get value(): T {
          return data[i];
        },
        set value(v: T) {
          data[i] = v;
        },
      };
    }
  }

  forEach(callback: (x: number, y: number, value: T) => void): void {
    const { data, height } = this;
    for (let i = 0; i < data.length; i++) {
      callback(Math.floor(i / height), i % height, data[i]);
    }
  }

  // ===========================================================================
  // UTILITY
  // ===========================================================================

  /**
   * New grid of the same dimensions with each cell transformed.
   */
  map<U>(fn: (value: T, x: number, y: number) => U): Grid2D<U> {
    const { data, height } = this;
    const out = new Array<U>(data.length);
    for (let i = 0; i < data.length; i++) {
      out[i] = fn(data[i], Math.floor(i / height), i % height);
    }
    return Grid2D.fromArray(this.width, height, out);
  }

  clone(clone: Cloner<T> = identity): Grid2D<T> {
    return this.map((value) => clone(value));
  }

  /**
   * Check if this grid equals another grid.
   * @param eq - Element equality; `Object.is` by default
   */
  equals(
    other: Grid2D<T>,
    eq: (a: T, b: T) => boolean = Object.is,
  ): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (!eq(this.data[i], other.data[i])) {
        return false;
      }
    }
    return true;
  }

  /**
   * Copy of the backing array in storage order.
   */
  toArray(): T[] {
    return this.data.slice();
  }

  toString(): string {
    return `Grid2D(${this.width}x${this.height})`;
  }
}
