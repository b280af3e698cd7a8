/**
 * Coverage service: applies configured defaults and runs the generator.
 */

import {
  CoverageGenerator,
  GridTooLargeError,
  circleCentersToCsv,
  coverageToGeoJson,
  type GeoJsonFeatureCollection,
  type PlannerConfig,
} from "@placegrid/engine";
import type { CoverageRequestBody } from "../models/requests.js";
import type { CoverageResponse } from "../models/responses.js";

export class CoverageService {
  constructor(private readonly config: PlannerConfig) {}

  /** Validate the request and refuse sweeps larger than `coverage.maxGridCells`. */
  private build(req: CoverageRequestBody): CoverageGenerator {
    const generator = new CoverageGenerator({
      polygons: req.polygons,
      radiusMeters: req.radiusMeters ?? this.config.coverage.radiusMeters,
      spacingFactor: req.spacingFactor ?? this.config.coverage.spacingFactor,
    });

    const size = generator.gridSize();
    const { maxGridCells } = this.config.coverage;
    if (size && size.rows * size.cols > maxGridCells) {
      console.warn(`[coverage] Refusing ${size.rows}x${size.cols} grid (limit ${maxGridCells} cells)`);
      throw new GridTooLargeError(
        `coverage grid of ${size.rows}x${size.cols} cells exceeds the limit of ${maxGridCells}; use a larger radius or smaller areas`,
      );
    }
    return generator;
  }

  generate(req: CoverageRequestBody): CoverageResponse {
    const { centers, grid, notice } = this.build(req).generate();
    return { centers, grid, notice };
  }

  /** Headerless `lat,long,radius` rows, as consumed by the nearby-search caller. */
  generateCsv(req: CoverageRequestBody): string {
    const result = this.build(req).generate();
    return circleCentersToCsv(result.centers, { includeAreaId: req.includeAreaId });
  }

  generateGeoJson(req: CoverageRequestBody): GeoJsonFeatureCollection {
    const generator = this.build(req);
    return coverageToGeoJson(generator.polygons, generator.generate());
  }
}
