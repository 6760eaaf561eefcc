/**
 * Grid types shared by the container and its codecs.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Produces an independent duplicate of a value.
 * Identity is correct for primitives and immutable values.
 */
export type Cloner<T> = (value: T) => T;

/**
 * `[x, y, value]` triple yielded by read-only iteration.
 */
export type GridEntry<T> = readonly [x: number, y: number, value: T];

/**
 * Writable handle to one cell, yielded by mutable iteration.
 * Assigning `value` stores into the grid.
 */
export interface GridCell<T> {
  readonly x: number;
  readonly y: number;
  value: T;
}

// =============================================================================
// GRID INTERFACES
// =============================================================================

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid.
 *
 * @example
 * ```typescript
 * function sum(grid: ReadonlyGrid2D<number>): number {
 *   let total = 0;
 *   for (const [, , v] of grid) total += v;
 *   return total;
 * }
 * ```
 */
export interface ReadonlyGrid2D<T> extends Iterable<GridEntry<T>> {
  readonly width: number;
  readonly height: number;
  readonly size: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): T;
  getAt(p: Point): T;
  entries(): Generator<GridEntry<T>>;
  values(): Generator<T>;
  forEach(callback: (x: number, y: number, value: T) => void): void;
}

/**
 * Mutable grid interface.
 */
export interface MutableGrid2D<T> extends ReadonlyGrid2D<T> {
  set(x: number, y: number, value: T): void;
  setAt(p: Point, value: T): void;
  cells(): Generator<GridCell<T>>;
  fill(value: T): void;
}
