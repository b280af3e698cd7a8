/**
 * GeoJSON export for itineraries: stop markers plus the visiting path.
 */

import type { GeoPoint, Itinerary, RoutePoint } from "@placegrid/types";
import { toPosition, type GeoJsonFeature, type GeoJsonFeatureCollection } from "./geojson.js";

/**
 * Export an itinerary as a FeatureCollection.
 *
 * Stops come first, in visit order. The path starts at the reference point
 * and is omitted when the itinerary is empty.
 */
export function itineraryToGeoJson<P extends RoutePoint>(
  itinerary: Itinerary<P>,
  reference: GeoPoint,
): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = itinerary.stops.map((stop): GeoJsonFeature => ({
    type: "Feature",
    geometry: { type: "Point", coordinates: toPosition(stop) },
    properties: {
      kind: "stop",
      id: stop.id,
      name: stop.name ?? null,
      order: stop.order,
      indicator: stop.indicator,
      distanceKm: Math.round(stop.distanceKm * 1000) / 1000,
    },
  }));

  if (itinerary.stops.length > 0) {
    features.push({
      type: "Feature",
      geometry: {
        type: "LineString",
        coordinates: [toPosition(reference), ...itinerary.stops.map(toPosition)],
      },
      properties: { kind: "path", stopCount: itinerary.stops.length },
    });
  }

  return { type: "FeatureCollection", features };
}
