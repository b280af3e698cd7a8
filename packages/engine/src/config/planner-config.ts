/**
 * Layered JSON config for planner defaults and named reference points.
 *
 * `configs/planner.json` is a partial override that deep-merges on top of
 * the hard-coded defaults below. Reference points (city name -> coordinate)
 * live here instead of in module constants, so every component that needs
 * them receives them explicitly.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { GeoPoint } from "@placegrid/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PlannerConfig {
  coverage: {
    /** Default circle radius in meters */
    radiusMeters: number;
    /** Default spacing factor in [0, 1] */
    spacingFactor: number;
    /** Largest rows x cols sweep the service runs for one request */
    maxGridCells: number;
  };
  itinerary: {
    /** Default number of stops */
    nPoints: number;
  };
  /** Lower-cased place name -> coordinate */
  referencePoints: Record<string, GeoPoint>;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  coverage: { radiusMeters: 500, spacingFactor: 0.5, maxGridCells: 250_000 },
  itinerary: { nPoints: 9 },
  referencePoints: {},
};

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Leaf-level deep merge: source values override target values. */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Config file resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/planner.json`.
 * Works from both source (packages/engine/src/config/) and compiled (dist/) paths.
 */
export function findPlannerConfigPath(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "planner.json");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/engine/src/config
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "planner.json");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function normalizeReferencePoints(points: Record<string, GeoPoint>): Record<string, GeoPoint> {
  const normalized: Record<string, GeoPoint> = {};
  for (const [name, point] of Object.entries(points)) {
    normalized[name.trim().toLowerCase()] = { lat: point.lat, lng: point.lng };
  }
  return normalized;
}

/**
 * Build a config from a parsed override object.
 *
 * Values of the wrong type fall back to the default for that key.
 */
export function mergePlannerConfig(overrides: unknown): PlannerConfig {
  if (!isPlainObject(overrides)) return DEFAULT_PLANNER_CONFIG;

  const defaults = DEFAULT_PLANNER_CONFIG;
  const merged = deepMerge(
    {
      coverage: { ...defaults.coverage },
      itinerary: { ...defaults.itinerary },
      referencePoints: { ...defaults.referencePoints },
    },
    overrides,
  );

  const coverage = isPlainObject(merged["coverage"]) ? merged["coverage"] : {};
  const itinerary = isPlainObject(merged["itinerary"]) ? merged["itinerary"] : {};
  const refs = isPlainObject(merged["referencePoints"]) ? merged["referencePoints"] : {};

  const points: Record<string, GeoPoint> = {};
  for (const [name, value] of Object.entries(refs)) {
    if (isPlainObject(value) && typeof value["lat"] === "number" && typeof value["lng"] === "number") {
      points[name] = { lat: value["lat"], lng: value["lng"] };
    }
  }

  return {
    coverage: {
      radiusMeters: numberOr(coverage["radiusMeters"], defaults.coverage.radiusMeters),
      spacingFactor: numberOr(coverage["spacingFactor"], defaults.coverage.spacingFactor),
      maxGridCells: numberOr(coverage["maxGridCells"], defaults.coverage.maxGridCells),
    },
    itinerary: {
      nPoints: numberOr(itinerary["nPoints"], defaults.itinerary.nPoints),
    },
    referencePoints: normalizeReferencePoints(points),
  };
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Load the planner config. Falls back to hard-coded defaults when the file
 * does not exist.
 *
 * @param filePath - Explicit config path (default: discovered `configs/planner.json`)
 */
export function loadPlannerConfig(filePath: string = findPlannerConfigPath()): PlannerConfig {
  if (!existsSync(filePath)) {
    console.warn(`[config] ${filePath} not found; using defaults`);
    return DEFAULT_PLANNER_CONFIG;
  }
  const raw = readFileSync(filePath, "utf-8");
  return mergePlannerConfig(JSON.parse(raw));
}

/**
 * Pick the starting point for an itinerary.
 *
 * An explicit coordinate wins; otherwise the city is looked up
 * case-insensitively in the configured reference points.
 */
export function resolveReferencePoint(
  input: { reference?: GeoPoint; city?: string },
  config: PlannerConfig,
): GeoPoint | null {
  if (input.reference) return input.reference;
  if (input.city) {
    return config.referencePoints[input.city.trim().toLowerCase()] ?? null;
  }
  return null;
}
