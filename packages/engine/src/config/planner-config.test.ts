import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_PLANNER_CONFIG,
  deepMerge,
  loadPlannerConfig,
  mergePlannerConfig,
  resolveReferencePoint,
} from "./planner-config.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("deepMerge", () => {
  it("overrides leaves and keeps untouched siblings", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 3 }, { a: { y: 5 } })).toEqual({
      a: { x: 1, y: 5 },
      b: 3,
    });
  });

  it("replaces arrays wholesale", () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });
});

describe("mergePlannerConfig", () => {
  it("fills missing keys from defaults", () => {
    const config = mergePlannerConfig({ coverage: { radiusMeters: 250 } });

    expect(config.coverage).toEqual({ radiusMeters: 250, spacingFactor: 0.5, maxGridCells: 250_000 });
    expect(config.itinerary).toEqual({ nPoints: 9 });
    expect(config.referencePoints).toEqual({});
  });

  it("lower-cases reference point names", () => {
    const config = mergePlannerConfig({ referencePoints: { " Milan ": { lat: 45.46, lng: 9.19 } } });
    expect(config.referencePoints).toEqual({ milan: { lat: 45.46, lng: 9.19 } });
  });

  it("drops malformed reference points and mistyped values", () => {
    const config = mergePlannerConfig({
      coverage: { spacingFactor: "wide" },
      referencePoints: { nowhere: { lat: "north" }, rome: { lat: 41.9, lng: 12.5 } },
    });

    expect(config.coverage.spacingFactor).toBe(0.5);
    expect(Object.keys(config.referencePoints)).toEqual(["rome"]);
  });

  it("returns defaults for a non-object", () => {
    expect(mergePlannerConfig(null)).toBe(DEFAULT_PLANNER_CONFIG);
    expect(mergePlannerConfig([1, 2])).toBe(DEFAULT_PLANNER_CONFIG);
  });
});

describe("loadPlannerConfig", () => {
  it("finds the repository config", () => {
    const config = loadPlannerConfig();

    expect(config.coverage.radiusMeters).toBe(500);
    expect(config.coverage.maxGridCells).toBe(250000);
    expect(config.referencePoints["milan"]).toEqual({ lat: 45.4641652, lng: 9.1918621 });
  });

  it("falls back to defaults when the file is missing", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadPlannerConfig("/nonexistent/planner.json");

    expect(config).toBe(DEFAULT_PLANNER_CONFIG);
    expect(warn).toHaveBeenCalledWith("[config] /nonexistent/planner.json not found; using defaults");
  });
});

describe("resolveReferencePoint", () => {
  const config = mergePlannerConfig({ referencePoints: { izmir: { lat: 38.41, lng: 27.12 } } });

  it("prefers an explicit coordinate", () => {
    expect(resolveReferencePoint({ reference: { lat: 1, lng: 2 }, city: "izmir" }, config)).toEqual({
      lat: 1,
      lng: 2,
    });
  });

  it("looks up cities case-insensitively", () => {
    expect(resolveReferencePoint({ city: "  IZMIR" }, config)).toEqual({ lat: 38.41, lng: 27.12 });
  });

  it("returns null for unknown cities or no input", () => {
    expect(resolveReferencePoint({ city: "atlantis" }, config)).toBeNull();
    expect(resolveReferencePoint({}, config)).toBeNull();
  });
});
