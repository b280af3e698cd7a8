export {
  haversineDistanceKm,
  haversineDistanceMeters,
  metersToLatDegrees,
  metersToLngDegrees,
  isValidCoordinate,
  assertValidCoordinate,
  EARTH_RADIUS_KM,
  EARTH_RADIUS_METERS,
} from "./distance.js";
export { createPolygon, polygonContains, polygonsBoundingBox } from "./polygon.js";
