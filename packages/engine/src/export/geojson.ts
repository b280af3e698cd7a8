/**
 * GeoJSON types (subset we need) and coordinate helpers.
 */

import type { GeoPoint } from "@placegrid/types";

export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonPoint | GeoJsonLineString | GeoJsonPolygon;
  properties: Record<string, unknown>;
}

export interface GeoJsonPoint {
  type: "Point";
  coordinates: [number, number];
}

export interface GeoJsonLineString {
  type: "LineString";
  coordinates: [number, number][];
}

export interface GeoJsonPolygon {
  type: "Polygon";
  coordinates: [number, number][][];
}

/** GeoJSON positions are [lng, lat] */
export function toPosition(point: GeoPoint): [number, number] {
  return [point.lng, point.lat];
}
