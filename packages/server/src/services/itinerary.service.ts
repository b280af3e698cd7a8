/**
 * Itinerary service: resolves the starting point and runs the sequencer.
 */

import type { GeoPoint } from "@placegrid/types";
import {
  RouteSequencer,
  itineraryToGeoJson,
  resolveReferencePoint,
  type GeoJsonFeatureCollection,
  type PlannerConfig,
} from "@placegrid/engine";
import type { ItineraryRequestBody, RoutePointBody } from "../models/requests.js";
import type { ItineraryResponse } from "../models/responses.js";

export class ItineraryService {
  constructor(private readonly config: PlannerConfig) {}

  private resolveReference(req: ItineraryRequestBody): GeoPoint {
    const reference = resolveReferencePoint(req, this.config);
    if (!reference) {
      throw new ReferencePointNotFoundError(
        req.city
          ? `No reference point configured for "${req.city}"`
          : "Either reference or city is required",
      );
    }
    return reference;
  }

  build(req: ItineraryRequestBody): ItineraryResponse<RoutePointBody> {
    const reference = this.resolveReference(req);
    const nPoints = req.nPoints ?? this.config.itinerary.nPoints;

    console.log(
      `[itinerary] ${req.candidates.length} candidates, ${nPoints} stops from (${reference.lat.toFixed(5)}, ${reference.lng.toFixed(5)})`,
    );

    const { stops, notice } = new RouteSequencer(req.candidates, reference, nPoints).run();
    return { stops, notice, reference };
  }

  buildGeoJson(req: ItineraryRequestBody): GeoJsonFeatureCollection {
    const { stops, notice, reference } = this.build(req);
    return itineraryToGeoJson({ stops, notice }, reference);
  }
}

export class ReferencePointNotFoundError extends Error {
  readonly status = 422;

  constructor(message: string) {
    super(message);
    this.name = "ReferencePointNotFoundError";
  }
}
