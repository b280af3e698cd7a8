/**
 * Coverage generator: tile search areas with sampling circles.
 *
 * Sweeps a lat/lng grid over the combined bounding box of all areas and
 * keeps the grid points that fall inside at least one area. Each kept
 * point becomes a circle center tagged with the first containing area.
 *
 * This is a heuristic grid sweep, not a minimum circle cover.
 */

import type {
  BoundingBox,
  CircleCenter,
  CoverageGrid,
  CoverageRequest,
  CoverageResult,
  Polygon,
} from "@placegrid/types";
import { InvalidParameterError } from "../errors.js";
import { createPolygon, polygonContains, polygonsBoundingBox } from "../geo/polygon.js";
import { computeGridSteps, gridAxis, gridAxisSize, type GridSteps } from "./grid.js";

interface Sweep extends GridSteps {
  bbox: BoundingBox;
}

export class CoverageGenerator {
  readonly polygons: readonly Polygon[];
  readonly radiusMeters: number;
  readonly spacingFactor: number;
  private readonly sweep: Sweep | null;

  /**
   * @throws InvalidParameterError for a non-positive radius, a spacing factor outside [0, 1],
   *   or a radius too small to give a usable grid step
   * @throws InvalidGeometryError for a malformed polygon
   */
  constructor(request: CoverageRequest) {
    const { radiusMeters, spacingFactor } = request;
    if (!Number.isFinite(radiusMeters) || radiusMeters <= 0) {
      throw new InvalidParameterError(`radiusMeters must be a positive number, got ${radiusMeters}`);
    }
    if (!Number.isFinite(spacingFactor) || spacingFactor < 0 || spacingFactor > 1) {
      throw new InvalidParameterError(`spacingFactor must be within [0, 1], got ${spacingFactor}`);
    }

    this.radiusMeters = radiusMeters;
    this.spacingFactor = spacingFactor;
    this.polygons = Object.freeze(request.polygons.map((vertices, i) => createPolygon(vertices, i + 1)));

    const bbox = polygonsBoundingBox(this.polygons);
    if (!bbox) {
      this.sweep = null;
      return;
    }
    const { latStep, lngStep } = computeGridSteps(bbox, radiusMeters, spacingFactor);
    if (!(latStep > 0 && lngStep > 0 && Number.isFinite(latStep) && Number.isFinite(lngStep))) {
      throw new InvalidParameterError(
        `radiusMeters ${radiusMeters} gives an unusable grid step (${latStep}, ${lngStep} degrees)`,
      );
    }
    this.sweep = { bbox, latStep, lngStep };
  }

  /**
   * Row and column counts of the sweep, computed without running it.
   * Null when there are no polygons.
   */
  gridSize(): { rows: number; cols: number } | null {
    if (!this.sweep) return null;
    const { bbox, latStep, lngStep } = this.sweep;
    return {
      rows: gridAxisSize(bbox.minLat, bbox.maxLat, latStep),
      cols: gridAxisSize(bbox.minLng, bbox.maxLng, lngStep),
    };
  }

  /**
   * Compute circle centers in sweep order (south to north, then west to east).
   *
   * With no polygons the result is empty and carries the NoAreasProvided notice.
   */
  generate(): CoverageResult {
    if (!this.sweep) {
      console.warn("[coverage] No areas provided; nothing to cover");
      const empty: CoverageResult = { centers: Object.freeze([]), grid: null, notice: "NoAreasProvided" };
      return Object.freeze(empty);
    }

    const start = performance.now();
    const { bbox, latStep, lngStep } = this.sweep;
    const rows = gridAxis(bbox.minLat, bbox.maxLat, latStep);
    const cols = gridAxis(bbox.minLng, bbox.maxLng, lngStep);

    const centers: CircleCenter[] = [];
    for (const lat of rows) {
      for (const lng of cols) {
        const point = { lat, lng };
        const owner = this.polygons.find((polygon) => polygonContains(polygon, point));
        if (!owner) continue;
        centers.push(
          Object.freeze({ lat, lng, radiusMeters: this.radiusMeters, areaId: owner.id }),
        );
      }
    }

    const grid: CoverageGrid = {
      bbox,
      latStep,
      lngStep,
      rows: rows.length,
      cols: cols.length,
    };

    console.log(
      `[coverage] ${centers.length} centers from ${grid.rows}x${grid.cols} grid over ${this.polygons.length} area(s) in ${(performance.now() - start).toFixed(0)}ms`,
    );

    const result: CoverageResult = { centers: Object.freeze(centers), grid, notice: null };
    return Object.freeze(result);
  }
}

/** Convenience wrapper: validate a request and generate its coverage. */
export function generateCoverage(request: CoverageRequest): CoverageResult {
  return new CoverageGenerator(request).generate();
}
