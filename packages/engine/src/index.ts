/**
 * @placegrid/engine
 *
 * Geometric core of the place-recommendation pipeline.
 *
 * Key concepts:
 * - Coverage: circles tiling search areas, one nearby-search request each
 * - Itinerary: scored destinations ordered into a visiting sequence
 *
 * Pipeline:
 * 1. Areas -> CoverageGenerator -> circle centers (fed to a places API)
 * 2. Places API results -> external scoring -> candidates with indicators
 * 3. Candidates + starting point -> RouteSequencer -> itinerary
 */

// Modules
export * from "./errors.js";
export * from "./geo/index.js";
export * from "./coverage/index.js";
export * from "./sequencing/index.js";
export * from "./export/index.js";
export * from "./config/index.js";
