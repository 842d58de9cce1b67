import { describe, expect, it } from "vitest";
import { DEFAULT_FORECASTER_CONFIG } from "../config.js";
import { fitHoltLinear, smoothingCandidates } from "./holt-linear.js";

const grid = DEFAULT_FORECASTER_CONFIG.smoothingGrid;

describe("smoothingCandidates", () => {
  it("covers the grid inclusively in ascending order", () => {
    const candidates = smoothingCandidates(grid);

    expect(candidates).toHaveLength(19);
    expect(candidates[0]).toBe(0.05);
    expect(candidates[9]).toBe(0.5);
    expect(candidates[18]).toBe(0.95);
  });
});

describe("fitHoltLinear", () => {
  it("continues a perfectly linear series", () => {
    const fit = fitHoltLinear([10, 20, 30, 40], grid);

    expect(fit?.forecast).toBeCloseTo(50, 9);
    expect(fit?.trend).toBeCloseTo(10, 9);
    expect(fit?.sse).toBeCloseTo(0, 9);
  });

  it("holds a constant series level", () => {
    const fit = fitHoltLinear([50, 50, 50, 50, 50], grid);

    expect(fit?.forecast).toBeCloseTo(50, 9);
    expect(fit?.trend).toBeCloseTo(0, 9);
  });

  it("picks parameters with no larger error than any other grid point", () => {
    const series = [100, 120, 90, 130, 110, 140, 95, 150];
    const fit = fitHoltLinear(series, grid);
    const coarse = fitHoltLinear(series, { min: 0.5, max: 0.5, step: 0.05 });

    expect(fit).not.toBeNull();
    expect(coarse).not.toBeNull();
    expect(fit?.sse ?? Number.POSITIVE_INFINITY).toBeLessThanOrEqual(coarse?.sse ?? 0);
  });

  it("refuses to fit a single point", () => {
    expect(fitHoltLinear([5], grid)).toBeNull();
    expect(fitHoltLinear([], grid)).toBeNull();
  });
});
