export { circleCentersToCsv, type CirclesCsvOptions } from "./circles-csv.js";
export { coverageToGeoJson } from "./coverage-geojson.js";
export { itineraryToGeoJson } from "./itinerary-geojson.js";
export type {
  GeoJsonFeatureCollection,
  GeoJsonFeature,
  GeoJsonPoint,
  GeoJsonLineString,
  GeoJsonPolygon,
} from "./geojson.js";
