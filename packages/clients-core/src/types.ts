/**
 * API request/response types for the placegrid server.
 *
 * These mirror the server's models so the client carries no server or
 * engine dependency.
 */

// ---------------------------------------------------------------------------
// Coordinate
// ---------------------------------------------------------------------------

export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

// ---------------------------------------------------------------------------
// Coverage
// ---------------------------------------------------------------------------

export interface CoverageRequest {
  /** Areas to cover, each an ordered vertex ring */
  polygons: GeoPoint[][];
  /** Circle radius in meters (server default when omitted) */
  radiusMeters?: number;
  /** Overlap control in [0, 1] (server default when omitted) */
  spacingFactor?: number;
}

export interface CircleCenter extends GeoPoint {
  radiusMeters: number;
  areaId: number;
}

export interface CoverageGrid {
  bbox: BoundingBox;
  latStep: number;
  lngStep: number;
  rows: number;
  cols: number;
}

export interface CoverageResponse {
  centers: CircleCenter[];
  grid: CoverageGrid | null;
  notice: "NoAreasProvided" | null;
}

// ---------------------------------------------------------------------------
// Itinerary
// ---------------------------------------------------------------------------

export interface RoutePoint extends GeoPoint {
  id: number | string;
  indicator: number;
  name?: string;
}

export interface ItineraryRequest {
  candidates: RoutePoint[];
  /** Starting point; takes precedence over city */
  reference?: GeoPoint;
  /** Configured reference point name */
  city?: string;
  nPoints?: number;
}

export interface ItineraryStop extends RoutePoint {
  order: number;
  distanceKm: number;
  adjustedDistance: number;
}

export interface ItineraryResponse {
  stops: ItineraryStop[];
  notice: "EmptyCandidatePool" | null;
  reference: GeoPoint;
}

// ---------------------------------------------------------------------------
// GeoJSON (format: "geojson" responses)
// ---------------------------------------------------------------------------

export type GeoJsonGeometry =
  | { type: "Point"; coordinates: [number, number] }
  | { type: "LineString"; coordinates: [number, number][] }
  | { type: "Polygon"; coordinates: [number, number][][] };

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonGeometry;
  properties: Record<string, unknown>;
}

export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  code?: string;
  details?: { path: string; message: string }[];
}
