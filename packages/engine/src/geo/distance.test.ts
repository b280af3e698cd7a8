import { describe, it, expect } from "vitest";
import {
  haversineDistanceKm,
  haversineDistanceMeters,
  metersToLatDegrees,
  metersToLngDegrees,
  assertValidCoordinate,
  isValidCoordinate,
} from "./distance.js";
import { InvalidCoordinateError } from "../errors.js";

describe("haversineDistanceKm", () => {
  it("measures 0.01° of longitude on the equator as ~1.112 km", () => {
    expect(haversineDistanceKm({ lat: 0, lng: 0 }, { lat: 0, lng: 0.01 })).toBeCloseTo(1.112, 3);
  });

  it("measures 0.02° of longitude on the equator as ~2.224 km", () => {
    expect(haversineDistanceKm({ lat: 0, lng: 0 }, { lat: 0, lng: 0.02 })).toBeCloseTo(2.224, 3);
  });

  it("measures one degree of latitude as ~111.195 km", () => {
    expect(haversineDistanceKm({ lat: 10, lng: 20 }, { lat: 11, lng: 20 })).toBeCloseTo(111.195, 2);
  });

  it("is zero for identical points", () => {
    expect(haversineDistanceKm({ lat: 45.46, lng: 9.19 }, { lat: 45.46, lng: 9.19 })).toBe(0);
  });

  it("is symmetric", () => {
    const a = { lat: 41.02, lng: 28.97 };
    const b = { lat: 38.41, lng: 27.12 };
    expect(haversineDistanceKm(a, b)).toBe(haversineDistanceKm(b, a));
  });

  it("rejects out-of-range latitude", () => {
    expect(() => haversineDistanceKm({ lat: 91, lng: 0 }, { lat: 0, lng: 0 })).toThrow(
      InvalidCoordinateError,
    );
  });

  it("rejects non-finite coordinates", () => {
    expect(() => haversineDistanceKm({ lat: 0, lng: 0 }, { lat: 0, lng: NaN })).toThrow(
      InvalidCoordinateError,
    );
    expect(() => haversineDistanceKm({ lat: Infinity, lng: 0 }, { lat: 0, lng: 0 })).toThrow(
      InvalidCoordinateError,
    );
  });
});

describe("haversineDistanceMeters", () => {
  it("agrees with the kilometer version", () => {
    const a = { lat: 0, lng: 0 };
    const b = { lat: 0, lng: 0.01 };
    expect(haversineDistanceMeters(a, b)).toBeCloseTo(1111.949, 2);
    expect(haversineDistanceMeters(a, b) / 1000).toBeCloseTo(haversineDistanceKm(a, b), 9);
  });
});

describe("metersToLatDegrees", () => {
  it("converts 500 m to ~0.0044966°", () => {
    expect(metersToLatDegrees(500)).toBeCloseTo(0.0044966, 7);
  });

  it("converts one degree's worth of meters back to one degree", () => {
    expect(metersToLatDegrees((6_371_000 * Math.PI) / 180)).toBeCloseTo(1, 12);
  });
});

describe("metersToLngDegrees", () => {
  it("matches latitude degrees on the equator", () => {
    expect(metersToLngDegrees(500, 0)).toBeCloseTo(metersToLatDegrees(500), 12);
  });

  it("doubles at 60° latitude where meridians are half as far apart", () => {
    expect(metersToLngDegrees(500, 60)).toBeCloseTo(2 * metersToLatDegrees(500), 10);
  });

  it("is the same north and south of the equator", () => {
    expect(metersToLngDegrees(500, -45)).toBeCloseTo(metersToLngDegrees(500, 45), 12);
  });
});

describe("coordinate validation", () => {
  it("accepts the extremes of the valid range", () => {
    expect(isValidCoordinate({ lat: -90, lng: -180 })).toBe(true);
    expect(isValidCoordinate({ lat: 90, lng: 180 })).toBe(true);
  });

  it("rejects longitude past 180", () => {
    expect(isValidCoordinate({ lat: 0, lng: 180.5 })).toBe(false);
  });

  it("names the offending value in the error", () => {
    expect(() => assertValidCoordinate({ lat: 100, lng: 5 }, "reference point")).toThrow(
      "reference point (100, 5)",
    );
  });
});
