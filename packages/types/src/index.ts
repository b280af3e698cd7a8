/**
 * @placegrid/types
 *
 * Shared domain types for the coverage and itinerary engine.
 *
 * - Geo: Points, polygons and bounding boxes
 * - Coverage: Sampling circles tiling search areas
 * - Itinerary: Ordered visiting sequences of scored destinations
 */

export * from "./geo.js";
export * from "./coverage.js";
export * from "./itinerary.js";
