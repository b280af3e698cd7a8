/**
 * Grid step derivation and index-based axis sampling for coverage sweeps.
 */

import type { BoundingBox } from "@placegrid/types";
import { InvalidParameterError } from "../errors.js";
import { metersToLatDegrees, metersToLngDegrees } from "../geo/distance.js";

/** Fraction of a step by which the last sample may overshoot the max bound */
const AXIS_TOLERANCE = 1e-9;

export interface GridSteps {
  /** Degrees of latitude between rows */
  latStep: number;
  /** Degrees of longitude between columns */
  lngStep: number;
}

/**
 * Latitude used to convert the radius into degrees of longitude: whichever
 * bound of the box lies further from the equator.
 */
export function referenceLatitude(bbox: BoundingBox): number {
  return Math.abs(bbox.maxLat) > Math.abs(bbox.minLat) ? bbox.maxLat : bbox.minLat;
}

/**
 * Derive row/column spacing for a sweep.
 *
 * A spacing factor of 0 puts centers one radius apart; 1 puts them two
 * radii apart so neighbouring circles touch.
 */
export function computeGridSteps(
  bbox: BoundingBox,
  radiusMeters: number,
  spacingFactor: number,
): GridSteps {
  const scale = 1 + spacingFactor;
  return {
    latStep: metersToLatDegrees(radiusMeters) * scale,
    lngStep: metersToLngDegrees(radiusMeters, referenceLatitude(bbox)) * scale,
  };
}

/**
 * Number of samples `gridAxis` returns for the same arguments, without
 * building the array.
 *
 * @throws InvalidParameterError when step is not a positive finite number or the count overflows
 */
export function gridAxisSize(min: number, max: number, step: number): number {
  if (!(step > 0) || !Number.isFinite(step)) {
    throw new InvalidParameterError(`grid step must be a positive finite number, got ${step}`);
  }
  const span = max - min;
  if (span <= 0) return 1;

  const count = Math.ceil(span / step);
  if (!Number.isFinite(count)) {
    throw new InvalidParameterError(`grid step ${step} is too small for a span of ${span}`);
  }
  return min + count * step > max + step * AXIS_TOLERANCE ? count : count + 1;
}

/**
 * Sample positions `min + i * step` for i = 0..ceil((max - min) / step),
 * keeping those that do not pass `max`.
 *
 * Positions are computed from the index rather than accumulated, so a long
 * axis neither drifts nor gains or loses a sample at its far edge.
 *
 * @throws InvalidParameterError when gridAxisSize does
 */
export function gridAxis(min: number, max: number, step: number): number[] {
  const size = gridAxisSize(min, max, step);
  const values: number[] = [];
  for (let i = 0; i < size; i++) {
    values.push(Math.min(min + i * step, max));
  }
  return values;
}
