import type {
  CircleCenter,
  CoverageGrid,
  CoverageNotice,
  GeoPoint,
  ItineraryNotice,
  ItineraryStop,
  RoutePoint,
} from "@placegrid/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

export interface CoverageResponse {
  centers: readonly CircleCenter[];
  grid: CoverageGrid | null;
  notice: CoverageNotice | null;
}

export interface ItineraryResponse<P extends RoutePoint = RoutePoint> {
  stops: readonly ItineraryStop<P>[];
  notice: ItineraryNotice | null;
  /** Starting point the sequence was anchored at */
  reference: GeoPoint;
}

export interface ErrorResponse {
  message: string;
  code?: string;
  details?: { path: string; message: string }[];
}
