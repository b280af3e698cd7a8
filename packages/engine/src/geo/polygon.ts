/**
 * Polygon construction and boundary-inclusive containment.
 *
 * Coordinates are treated as planar (lng = x, lat = y). Polygons in this
 * project are city-district sized, where the curvature error is far below
 * the grid spacing.
 */

import type { BoundingBox, GeoPoint, Polygon } from "@placegrid/types";
import { InvalidGeometryError } from "../errors.js";
import { isValidCoordinate } from "./distance.js";

/** Distance (degrees) from an edge within which a point counts as on it */
const EDGE_TOLERANCE = 1e-12;

/**
 * Validate a vertex ring and freeze it into a Polygon.
 *
 * @param id - 1-based index of the polygon within its request
 * @throws InvalidGeometryError for fewer than 3 vertices or an unusable vertex
 */
export function createPolygon(vertices: readonly GeoPoint[], id: number): Polygon {
  if (vertices.length < 3) {
    throw new InvalidGeometryError(
      `polygon ${id} has ${vertices.length} vertices; at least 3 are required`,
    );
  }
  vertices.forEach((v, i) => {
    if (!isValidCoordinate(v)) {
      throw new InvalidGeometryError(
        `polygon ${id} vertex ${i} (${v.lat}, ${v.lng}) is not a valid coordinate`,
      );
    }
  });
  return Object.freeze({
    id,
    vertices: Object.freeze(vertices.map((v) => Object.freeze({ lat: v.lat, lng: v.lng }))),
  });
}

/** Is `p` on the closed segment a-b? */
function onSegment(p: GeoPoint, a: GeoPoint, b: GeoPoint): boolean {
  // |cross| is the edge length times the point's distance from the edge's line
  const cross = (b.lng - a.lng) * (p.lat - a.lat) - (b.lat - a.lat) * (p.lng - a.lng);
  if (Math.abs(cross) > EDGE_TOLERANCE * Math.hypot(b.lat - a.lat, b.lng - a.lng)) return false;
  return (
    p.lng >= Math.min(a.lng, b.lng) &&
    p.lng <= Math.max(a.lng, b.lng) &&
    p.lat >= Math.min(a.lat, b.lat) &&
    p.lat <= Math.max(a.lat, b.lat)
  );
}

/**
 * Point-in-polygon test where points on an edge or vertex count as inside.
 *
 * Edges are checked first; interior points are then classified by casting
 * a ray toward +lng and counting crossings (even-odd rule).
 */
export function polygonContains(polygon: Polygon, point: GeoPoint): boolean {
  const vs = polygon.vertices;
  const n = vs.length;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    if (onSegment(point, vs[j]!, vs[i]!)) return true;
  }

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const a = vs[i]!;
    const b = vs[j]!;
    if (a.lat > point.lat !== b.lat > point.lat) {
      const crossLng = a.lng + ((point.lat - a.lat) / (b.lat - a.lat)) * (b.lng - a.lng);
      if (point.lng < crossLng) inside = !inside;
    }
  }
  return inside;
}

/**
 * Bounding box over the vertices of every polygon.
 * Returns null when there are no polygons.
 */
export function polygonsBoundingBox(polygons: readonly Polygon[]): BoundingBox | null {
  if (polygons.length === 0) return null;

  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const polygon of polygons) {
    for (const v of polygon.vertices) {
      if (v.lat < minLat) minLat = v.lat;
      if (v.lat > maxLat) maxLat = v.lat;
      if (v.lng < minLng) minLng = v.lng;
      if (v.lng > maxLng) maxLng = v.lng;
    }
  }
  return { minLat, maxLat, minLng, maxLng };
}
