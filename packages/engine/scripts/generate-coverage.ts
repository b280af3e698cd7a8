/**
 * Tile the areas in a JSON file with sampling circles and write the
 * nearby-search CSV plus a GeoJSON preview.
 *
 * Usage: npx tsx scripts/generate-coverage.ts [areas-path] [--radius=500] [--spacing=0.5] [--area-id]
 *
 * The areas file holds `{ "polygons": [[{ "lat": .., "lng": .. }, ...], ...] }`.
 * Radius and spacing default to configs/planner.json.
 *
 * Default input: ../../data/areas.json
 * Outputs are written next to the input as circles.csv and coverage.geojson.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { GeoPoint } from "@placegrid/types";
import {
  CoverageGenerator,
  circleCentersToCsv,
  coverageToGeoJson,
  loadPlannerConfig,
} from "../src/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const args = process.argv.slice(2);
const flags = args.filter((a) => a.startsWith("--"));
const positional = args.filter((a) => !a.startsWith("--"));

const inputPath = positional[0] ?? resolve(__dirname, "../../../data/areas.json");

function numericFlag(name: string): number | undefined {
  const flag = flags.find((f) => f.startsWith(`--${name}=`));
  return flag === undefined ? undefined : Number(flag.slice(name.length + 3));
}

function isGeoPoint(value: unknown): value is GeoPoint {
  return (
    typeof value === "object" &&
    value !== null &&
    "lat" in value &&
    "lng" in value &&
    typeof value.lat === "number" &&
    typeof value.lng === "number"
  );
}

function readPolygons(path: string): GeoPoint[][] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (typeof raw !== "object" || raw === null || !("polygons" in raw) || !Array.isArray(raw.polygons)) {
    throw new Error(`${path}: expected an object with a "polygons" array`);
  }
  return raw.polygons.map((ring: unknown, i: number) => {
    if (!Array.isArray(ring) || !ring.every(isGeoPoint)) {
      throw new Error(`${path}: polygon ${i + 1} must be an array of { lat, lng } points`);
    }
    return ring;
  });
}

function main() {
  const config = loadPlannerConfig();
  const polygons = readPolygons(inputPath);
  console.log(`Areas: ${polygons.length} from ${inputPath}`);

  const generator = new CoverageGenerator({
    polygons,
    radiusMeters: numericFlag("radius") ?? config.coverage.radiusMeters,
    spacingFactor: numericFlag("spacing") ?? config.coverage.spacingFactor,
  });
  const result = generator.generate();
  console.log(`Circles: ${result.centers.length.toLocaleString()}`);

  const outDir = dirname(inputPath);
  const csvPath = join(outDir, "circles.csv");
  writeFileSync(csvPath, circleCentersToCsv(result.centers, { includeAreaId: flags.includes("--area-id") }));
  console.log(`Written to: ${csvPath}`);

  const geojsonPath = join(outDir, "coverage.geojson");
  writeFileSync(geojsonPath, JSON.stringify(coverageToGeoJson(generator.polygons, result)));
  console.log(`Written to: ${geojsonPath}`);
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
