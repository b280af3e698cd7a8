/**
 * Flat-file export of circle centers.
 *
 * The nearby-search caller reads one `lat,long,radius` row per request,
 * without a header, so that is the default shape.
 */

import type { CircleCenter } from "@placegrid/types";

export interface CirclesCsvOptions {
  /** Append an `area_id` column (default false) */
  includeAreaId?: boolean;
  /** Emit a header line (default false) */
  header?: boolean;
}

/**
 * Serialize circle centers to CSV, one newline-terminated row per center.
 */
export function circleCentersToCsv(
  centers: readonly CircleCenter[],
  options: CirclesCsvOptions = {},
): string {
  const lines: string[] = [];
  if (options.header) {
    lines.push(options.includeAreaId ? "lat,long,radius,area_id" : "lat,long,radius");
  }
  for (const c of centers) {
    const row = [c.lat, c.lng, c.radiusMeters];
    if (options.includeAreaId) row.push(c.areaId);
    lines.push(row.join(","));
  }
  return lines.map((line) => line + "\n").join("");
}
