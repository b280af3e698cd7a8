/**
 * Geographic utility types.
 */

/** A WGS84 coordinate in degrees */
export interface GeoPoint {
  readonly lat: number;
  readonly lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * Closed ring of vertices identified within a request.
 *
 * The last vertex connects back to the first; the ring is not repeated.
 */
export interface Polygon {
  /** 1-based index of the polygon within its request */
  readonly id: number;
  readonly vertices: readonly GeoPoint[];
}
