/**
 * GeoJSON export for coverage results.
 *
 * Emits one Polygon feature per search area followed by one Point feature
 * per circle center, for inspection in geojson.io, QGIS, etc.
 */

import type { CoverageResult, Polygon } from "@placegrid/types";
import { toPosition, type GeoJsonFeature, type GeoJsonFeatureCollection } from "./geojson.js";

/** Stroke colors cycled across areas */
const AREA_COLORS = ["#2563eb", "#16a34a", "#9333ea", "#ea580c", "#b91c1c", "#0891b2"];

export function coverageToGeoJson(
  polygons: readonly Polygon[],
  result: CoverageResult,
): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = [];

  for (const polygon of polygons) {
    const ring = polygon.vertices.map(toPosition);
    const first = ring[0];
    if (first) ring.push([first[0], first[1]]);
    features.push({
      type: "Feature",
      geometry: { type: "Polygon", coordinates: [ring] },
      properties: {
        kind: "area",
        areaId: polygon.id,
        stroke: AREA_COLORS[(polygon.id - 1) % AREA_COLORS.length],
      },
    });
  }

  for (const center of result.centers) {
    features.push({
      type: "Feature",
      geometry: { type: "Point", coordinates: toPosition(center) },
      properties: {
        kind: "circle",
        areaId: center.areaId,
        radiusMeters: center.radiusMeters,
      },
    });
  }

  return { type: "FeatureCollection", features };
}
