import { describe, expect, it } from "vitest";
import { countNonFinite, Grid2D, isAnyNaN } from "../src/core";

describe("isAnyNaN", () => {
  it("is false for an all-finite grid", () => {
    const grid = Grid2D.generate(4, 3, (x, y) => x - y * 0.5);
    expect(isAnyNaN(grid)).toBe(false);
  });

  it("detects a single NaN", () => {
    const grid = new Grid2D(4, 3, 1.5);
    grid.set(3, 2, Number.NaN);
    expect(isAnyNaN(grid)).toBe(true);
  });

  it("detects NaN produced by arithmetic", () => {
    const grid = new Grid2D(2, 2, 0);
    grid.set(0, 1, 0 / 0);
    expect(isAnyNaN(grid)).toBe(true);
  });

  it("does not treat infinity as NaN", () => {
    const grid = new Grid2D(2, 1, Number.POSITIVE_INFINITY);
    expect(isAnyNaN(grid)).toBe(false);
  });

  it("is false for an empty grid", () => {
    expect(isAnyNaN(new Grid2D(0, 3, Number.NaN))).toBe(false);
  });
});

describe("countNonFinite", () => {
  it("counts NaN and infinities", () => {
    const grid = new Grid2D(3, 1, 0);
    grid.set(0, 0, Number.NaN);
    grid.set(2, 0, Number.NEGATIVE_INFINITY);
    expect(countNonFinite(grid)).toBe(2);
  });
});
