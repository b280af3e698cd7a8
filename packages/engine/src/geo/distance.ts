/**
 * Great-circle distance and meter/degree conversion.
 */

import type { GeoPoint } from "@placegrid/types";
import { InvalidCoordinateError } from "../errors.js";

/** Mean Earth radius in meters */
export const EARTH_RADIUS_METERS = 6_371_000;

/** Mean Earth radius in kilometers */
export const EARTH_RADIUS_KM = 6371;

const TO_RAD = Math.PI / 180;
const TO_DEG = 180 / Math.PI;

/** True when lat/lng are finite and inside [-90,90] / [-180,180]. */
export function isValidCoordinate(point: GeoPoint): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lng) &&
    point.lat >= -90 &&
    point.lat <= 90 &&
    point.lng >= -180 &&
    point.lng <= 180
  );
}

/**
 * Throw InvalidCoordinateError unless the point is a usable coordinate.
 *
 * @param label - Prefix for the error message (e.g. "reference point")
 */
export function assertValidCoordinate(point: GeoPoint, label = "coordinate"): void {
  if (!isValidCoordinate(point)) {
    throw new InvalidCoordinateError(
      `${label} (${point.lat}, ${point.lng}) is not a finite latitude in [-90, 90] and longitude in [-180, 180]`,
    );
  }
}

function centralAngle(a: GeoPoint, b: GeoPoint): number {
  assertValidCoordinate(a);
  assertValidCoordinate(b);
  const dLat = (b.lat - a.lat) * TO_RAD;
  const dLng = (b.lng - a.lng) * TO_RAD;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * TO_RAD) * Math.cos(b.lat * TO_RAD) * sinHalfLng * sinHalfLng;
  return 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Haversine distance between two coordinates in kilometers.
 */
export function haversineDistanceKm(a: GeoPoint, b: GeoPoint): number {
  return EARTH_RADIUS_KM * centralAngle(a, b);
}

/**
 * Haversine distance between two coordinates in meters.
 */
export function haversineDistanceMeters(a: GeoPoint, b: GeoPoint): number {
  return EARTH_RADIUS_METERS * centralAngle(a, b);
}

/** Degrees of latitude spanned by a north-south distance. */
export function metersToLatDegrees(meters: number): number {
  return (meters / EARTH_RADIUS_METERS) * TO_DEG;
}

/**
 * Degrees of longitude spanned by an east-west distance at a given latitude.
 *
 * Meridians converge toward the poles, so the same distance covers more
 * degrees the further the reference latitude is from the equator.
 */
export function metersToLngDegrees(meters: number, referenceLatDegrees: number): number {
  return (meters / (EARTH_RADIUS_METERS * Math.cos(referenceLatDegrees * TO_RAD))) * TO_DEG;
}
