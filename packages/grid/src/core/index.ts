/**
 * Core module - the 2D container and its numeric helpers.
 */

export { isAnyNaN, countNonFinite } from "./float";
export { Grid2D } from "./grid2d";
export * from "./types";
