import { z } from "zod";

export const geoPointSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const coverageRequestSchema = z.object({
  /** Areas to cover, each an ordered vertex ring */
  polygons: z.array(z.array(geoPointSchema)),
  /** Circle radius in meters (default from config) */
  radiusMeters: z.number().optional(),
  /** Overlap control in [0, 1] (default from config) */
  spacingFactor: z.number().optional(),
  /** Response shape (default: json) */
  format: z.enum(["json", "csv", "geojson"]).optional(),
  /** Add an area_id column to CSV output */
  includeAreaId: z.boolean().optional(),
});

export const routePointSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    lat: z.number(),
    lng: z.number(),
    indicator: z.number(),
    name: z.string().optional(),
  })
  .passthrough();

export const itineraryRequestSchema = z.object({
  candidates: z.array(routePointSchema),
  /** Starting point; takes precedence over city */
  reference: geoPointSchema.optional(),
  /** Configured reference point name, used when no coordinate is given */
  city: z.string().optional(),
  /** Number of stops (default from config) */
  nPoints: z.number().int().optional(),
  /** Response shape (default: json) */
  format: z.enum(["json", "geojson"]).optional(),
});

export type CoverageRequestBody = z.infer<typeof coverageRequestSchema>;
export type ItineraryRequestBody = z.infer<typeof itineraryRequestSchema>;
export type RoutePointBody = z.infer<typeof routePointSchema>;
