import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { CoverageRequest, CoverageResponse, GeoJsonFeatureCollection } from "./types.js";

export class CoverageClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/coverage", config);
  }

  /** Tile areas with sampling circles */
  public async generate(request: CoverageRequest): Promise<CoverageResponse> {
    return this.client.post<CoverageResponse>({ body: request });
  }

  /** Circle centers as `lat,long,radius[,area_id]` rows */
  public async generateCsv(
    request: CoverageRequest,
    options: { includeAreaId?: boolean } = {},
  ): Promise<string> {
    return this.client.post<string>({
      body: { ...request, format: "csv", includeAreaId: options.includeAreaId },
      responseType: "text",
    });
  }

  /** Areas and circle centers as a GeoJSON FeatureCollection */
  public async generateGeoJson(request: CoverageRequest): Promise<GeoJsonFeatureCollection> {
    return this.client.post<GeoJsonFeatureCollection>({ body: { ...request, format: "geojson" } });
  }
}
