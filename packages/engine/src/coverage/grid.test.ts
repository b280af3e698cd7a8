import { describe, it, expect } from "vitest";
import { computeGridSteps, gridAxis, gridAxisSize, referenceLatitude } from "./grid.js";
import { InvalidParameterError } from "../errors.js";
import { metersToLatDegrees, metersToLngDegrees } from "../geo/distance.js";

describe("referenceLatitude", () => {
  it("picks the bound further from the equator", () => {
    expect(referenceLatitude({ minLat: 0, maxLat: 0.01, minLng: 0, maxLng: 1 })).toBe(0.01);
    expect(referenceLatitude({ minLat: -50, maxLat: 10, minLng: 0, maxLng: 1 })).toBe(-50);
    expect(referenceLatitude({ minLat: 45.44, maxLat: 45.47, minLng: 9, maxLng: 9.2 })).toBe(45.47);
  });
});

describe("computeGridSteps", () => {
  const bbox = { minLat: 41.87, maxLat: 41.92, minLng: 12.44, maxLng: 12.51 };

  it("uses one radius per step at spacing factor 0", () => {
    const steps = computeGridSteps(bbox, 500, 0);
    expect(steps.latStep).toBe(metersToLatDegrees(500));
    expect(steps.lngStep).toBe(metersToLngDegrees(500, 41.92));
  });

  it("uses exactly two radii per step at spacing factor 1", () => {
    const tight = computeGridSteps(bbox, 500, 0);
    const loose = computeGridSteps(bbox, 500, 1);
    expect(loose.latStep).toBe(2 * tight.latStep);
    expect(loose.lngStep).toBe(2 * tight.lngStep);
  });

  it("widens longitude steps away from the equator", () => {
    const steps = computeGridSteps(bbox, 500, 0.5);
    expect(steps.lngStep).toBeGreaterThan(steps.latStep);
  });
});

describe("gridAxis", () => {
  it("samples min through max when the span is a whole number of steps", () => {
    expect(gridAxis(0, 1, 0.25)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it("stops before passing max", () => {
    const values = gridAxis(0, 1, 0.3);
    expect(values).toHaveLength(4);
    expect(values[3]).toBeCloseTo(0.9, 12);
  });

  it("keeps a far-edge sample that lands a rounding error past max", () => {
    // 3 * 0.1 === 0.30000000000000004
    expect(gridAxis(0, 0.3, 0.1)).toEqual([0, 0.1, 0.2, 0.3]);
  });

  it("returns the single bound for a zero-width span", () => {
    expect(gridAxis(5, 5, 1)).toEqual([5]);
  });

  it("returns only min when the step exceeds the span", () => {
    expect(gridAxis(0, 0.001, 0.01)).toEqual([0]);
  });

  it("rejects a zero or non-finite step", () => {
    expect(() => gridAxis(0, 1, 0)).toThrow(InvalidParameterError);
    expect(() => gridAxis(0, 1, Number.NaN)).toThrow(InvalidParameterError);
    expect(() => gridAxis(0, 1, Infinity)).toThrow(InvalidParameterError);
  });

  it("rejects a step too small to count", () => {
    expect(() => gridAxis(0, 1, 1e-320)).toThrow(InvalidParameterError);
  });

  it("computes each sample from its index", () => {
    const step = 0.0044966;
    const values = gridAxis(10, 11, step);
    values.forEach((v, i) => expect(v).toBe(10 + i * step));
  });
});

describe("gridAxisSize", () => {
  it("agrees with the length of gridAxis", () => {
    const cases: [number, number, number][] = [
      [0, 1, 0.25],
      [0, 1, 0.3],
      [0, 0.3, 0.1],
      [5, 5, 1],
      [0, 0.001, 0.01],
      [10, 11, 0.0044966],
    ];
    for (const [min, max, step] of cases) {
      expect(gridAxisSize(min, max, step)).toBe(gridAxis(min, max, step).length);
    }
  });

  it("counts a long axis without allocating it", () => {
    expect(gridAxisSize(0, 1, 1e-9)).toBe(1_000_000_001);
  });
});
