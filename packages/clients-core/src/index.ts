// Base
export {
  BaseClient,
  ApiError,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { CoverageClient } from "./coverageClient.js";
export { ItineraryClient } from "./itineraryClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Coordinate
  GeoPoint,
  BoundingBox,
  // Coverage
  CoverageRequest,
  CircleCenter,
  CoverageGrid,
  CoverageResponse,
  // Itinerary
  RoutePoint,
  ItineraryRequest,
  ItineraryStop,
  ItineraryResponse,
  // GeoJSON
  GeoJsonGeometry,
  GeoJsonFeature,
  GeoJsonFeatureCollection,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
