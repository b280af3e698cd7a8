/**
 * Route sequencer: greedy ordering of scored destinations.
 *
 * Starting from a reference point, repeatedly picks the remaining candidate
 * with the smallest distance-to-reference divided by its indicator, then
 * moves the reference onto that candidate. No backtracking, no optimality
 * guarantee: this is a nearest-weighted-neighbour walk, not a TSP solver.
 */

import type {
  GeoPoint,
  Itinerary,
  ItineraryStop,
  RoutePoint,
  RoutePointId,
} from "@placegrid/types";
import { InvalidIndicatorError, InvalidParameterError } from "../errors.js";
import { assertValidCoordinate, haversineDistanceKm } from "../geo/distance.js";

/**
 * Total order on candidate ids used to break adjusted-distance ties.
 *
 * Numbers sort numerically and before strings; strings sort by code unit.
 */
export function compareIds(a: RoutePointId, b: RoutePointId): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Candidate scored against the current reference point */
interface ScoredCandidate<P extends RoutePoint> {
  candidate: P;
  distanceKm: number;
  adjustedDistance: number;
}

export class RouteSequencer<P extends RoutePoint = RoutePoint> {
  private readonly candidates: readonly P[];
  private readonly reference: GeoPoint;
  private readonly nPoints: number;

  /**
   * @param candidates - Destinations to order; never modified
   * @param reference - Starting point of the walk
   * @param nPoints - Maximum number of stops (integer >= 0)
   * @throws InvalidIndicatorError, InvalidCoordinateError, InvalidParameterError
   */
  constructor(candidates: readonly P[], reference: GeoPoint, nPoints: number) {
    if (!Number.isInteger(nPoints) || nPoints < 0) {
      throw new InvalidParameterError(`nPoints must be a non-negative integer, got ${nPoints}`);
    }
    assertValidCoordinate(reference, "reference point");

    const seen = new Set<RoutePointId>();
    for (const c of candidates) {
      if (seen.has(c.id)) {
        throw new InvalidParameterError(`duplicate candidate id ${String(c.id)}`);
      }
      seen.add(c.id);
      assertValidCoordinate(c, `candidate ${String(c.id)}`);
      if (!Number.isFinite(c.indicator) || c.indicator <= 0) {
        throw new InvalidIndicatorError(
          `candidate ${String(c.id)} has indicator ${c.indicator}; it must be a positive number`,
        );
      }
    }

    this.candidates = Object.freeze(candidates.map((c) => ({ ...c })));
    this.reference = { lat: reference.lat, lng: reference.lng };
    this.nPoints = nPoints;
  }

  /**
   * Build the itinerary.
   *
   * Returns at most nPoints stops; fewer when the pool runs out first.
   */
  run(): Itinerary<P> {
    if (this.candidates.length === 0) {
      console.warn("[sequencer] Empty candidate pool; returning empty itinerary");
      const empty: Itinerary<P> = { stops: Object.freeze([]), notice: "EmptyCandidatePool" };
      return Object.freeze(empty);
    }

    const pool = [...this.candidates];
    const stops: ItineraryStop<P>[] = [];
    let reference = this.reference;

    while (stops.length < this.nPoints && pool.length > 0) {
      const selected = this.selectNext(pool, reference);
      if (!selected) break;
      pool.splice(selected.index, 1);

      const { candidate, distanceKm, adjustedDistance } = selected.scored;
      const stop: ItineraryStop<P> = {
        ...candidate,
        order: stops.length + 1,
        distanceKm,
        adjustedDistance,
      };
      stops.push(stop);
      reference = { lat: candidate.lat, lng: candidate.lng };
    }

    console.log(
      `[sequencer] Ordered ${stops.length} of ${this.candidates.length} candidates (requested ${this.nPoints})`,
    );

    const itinerary: Itinerary<P> = { stops: Object.freeze(stops), notice: null };
    return Object.freeze(itinerary);
  }

  /** Position in `pool` of the candidate with the smallest adjusted distance. */
  private selectNext(
    pool: readonly P[],
    reference: GeoPoint,
  ): { index: number; scored: ScoredCandidate<P> } | null {
    let selected: { index: number; scored: ScoredCandidate<P> } | null = null;

    for (let index = 0; index < pool.length; index++) {
      const candidate = pool[index]!;
      const distanceKm = haversineDistanceKm(reference, candidate);
      const scored = { candidate, distanceKm, adjustedDistance: distanceKm / candidate.indicator };
      const current = selected?.scored;
      if (
        !current ||
        scored.adjustedDistance < current.adjustedDistance ||
        (scored.adjustedDistance === current.adjustedDistance &&
          compareIds(candidate.id, current.candidate.id) < 0)
      ) {
        selected = { index, scored };
      }
    }

    return selected;
  }
}

/** Convenience wrapper: validate inputs and build the itinerary. */
export function sequenceRoute<P extends RoutePoint>(
  candidates: readonly P[],
  reference: GeoPoint,
  nPoints: number,
): Itinerary<P> {
  return new RouteSequencer(candidates, reference, nPoints).run();
}
