/**
 * Coverage results - circles tiling a set of search areas.
 *
 * Each circle center drives one nearby-search request against a places API,
 * so the grid density directly controls request volume.
 */

import type { BoundingBox, GeoPoint } from "./geo.js";

/** Input to a coverage computation */
export interface CoverageRequest {
  /** Areas to cover, each an ordered vertex ring in degrees */
  polygons: readonly (readonly GeoPoint[])[];
  /** Circle radius in meters (> 0) */
  radiusMeters: number;
  /**
   * Overlap control in [0, 1].
   * 0 = centers one radius apart (max overlap), 1 = two radii apart (tangent).
   */
  spacingFactor: number;
}

/** A generated sampling circle */
export interface CircleCenter extends GeoPoint {
  readonly radiusMeters: number;
  /** 1-based index of the first input polygon containing the center */
  readonly areaId: number;
}

/** Description of the swept grid */
export interface CoverageGrid {
  bbox: BoundingBox;
  /** Row spacing in degrees of latitude */
  latStep: number;
  /** Column spacing in degrees of longitude */
  lngStep: number;
  rows: number;
  cols: number;
}

/** Non-fatal condition reported by a coverage run */
export type CoverageNotice = "NoAreasProvided";

/** Output of a coverage computation */
export interface CoverageResult {
  /** Centers in sweep order: south to north, west to east within a row */
  readonly centers: readonly CircleCenter[];
  /** Grid parameters, or null when there was nothing to sweep */
  readonly grid: CoverageGrid | null;
  readonly notice: CoverageNotice | null;
}
