/**
 * Itinerary types - the output of route sequencing.
 *
 * Candidates come from an upstream scoring pipeline that collapses
 * similarity, rating, review volume and proximity into one positive
 * indicator. Higher indicators pull a candidate earlier in the sequence.
 */

import type { GeoPoint } from "./geo.js";

/** Identifier of a candidate destination */
export type RoutePointId = number | string;

/** A candidate destination */
export interface RoutePoint extends GeoPoint {
  readonly id: RoutePointId;
  /** Desirability weight (> 0); higher = more attractive */
  readonly indicator: number;
  /** Optional display name carried through unchanged */
  readonly name?: string;
}

/** A selected destination, annotated with its place in the sequence */
export type ItineraryStop<P extends RoutePoint = RoutePoint> = P & {
  /** 1-based visit order */
  readonly order: number;
  /** Great-circle distance in km from the reference point at selection time */
  readonly distanceKm: number;
  /** distanceKm / indicator */
  readonly adjustedDistance: number;
};

/** Non-fatal condition reported by a sequencing run */
export type ItineraryNotice = "EmptyCandidatePool";

/** Ordered visiting sequence */
export interface Itinerary<P extends RoutePoint = RoutePoint> {
  readonly stops: readonly ItineraryStop<P>[];
  readonly notice: ItineraryNotice | null;
}
