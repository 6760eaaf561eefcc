import type { ReadonlyGrid2D } from "./types";

/**
 * True if any cell holds NaN.
 * Scans with `Number.isNaN`, since NaN never equals itself.
 */
export function isAnyNaN(grid: ReadonlyGrid2D<number>): boolean {
  for (const value of grid.values()) {
    if (Number.isNaN(value)) return true;
  }
  return false;
}

/**
 * Count of non-finite cells (NaN or +/-Infinity).
 */
export function countNonFinite(grid: ReadonlyGrid2D<number>): number {
  let count = 0;
  for (const value of grid.values()) {
    if (!Number.isFinite(value)) count++;
  }
  return count;
}
