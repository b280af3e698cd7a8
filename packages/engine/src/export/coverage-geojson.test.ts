import { describe, it, expect } from "vitest";
import type { CoverageResult } from "@placegrid/types";
import { coverageToGeoJson } from "./coverage-geojson.js";
import { createPolygon } from "../geo/polygon.js";

describe("coverageToGeoJson", () => {
  const polygon = createPolygon(
    [
      { lat: 0, lng: 0 },
      { lat: 0, lng: 0.01 },
      { lat: 0.01, lng: 0.01 },
    ],
    1,
  );
  const result: CoverageResult = {
    centers: [{ lat: 0.002, lng: 0.005, radiusMeters: 300, areaId: 1 }],
    grid: null,
    notice: null,
  };

  it("emits area polygons before circle points", () => {
    const geojson = coverageToGeoJson([polygon], result);

    expect(geojson.type).toBe("FeatureCollection");
    expect(geojson.features.map((f) => f.properties["kind"])).toEqual(["area", "circle"]);
  });

  it("closes each area ring in [lng, lat] order", () => {
    const [area] = coverageToGeoJson([polygon], result).features;

    expect(area?.geometry).toEqual({
      type: "Polygon",
      coordinates: [
        [
          [0, 0],
          [0.01, 0],
          [0.01, 0.01],
          [0, 0],
        ],
      ],
    });
    expect(area?.properties).toEqual({ kind: "area", areaId: 1, stroke: "#2563eb" });
  });

  it("tags circle points with their area and radius", () => {
    const circle = coverageToGeoJson([polygon], result).features[1];

    expect(circle?.geometry).toEqual({ type: "Point", coordinates: [0.005, 0.002] });
    expect(circle?.properties).toEqual({ kind: "circle", areaId: 1, radiusMeters: 300 });
  });

  it("is empty when there are no areas and no centers", () => {
    const empty: CoverageResult = { centers: [], grid: null, notice: "NoAreasProvided" };
    expect(coverageToGeoJson([], empty).features).toEqual([]);
  });
});
