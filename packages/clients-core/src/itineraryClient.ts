import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { GeoJsonFeatureCollection, ItineraryRequest, ItineraryResponse } from "./types.js";

export class ItineraryClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/itinerary", config);
  }

  /** Order scored candidates into a visiting sequence */
  public async build(request: ItineraryRequest): Promise<ItineraryResponse> {
    return this.client.post<ItineraryResponse>({ body: request });
  }

  /** Stops and the path through them as a GeoJSON FeatureCollection */
  public async buildGeoJson(request: ItineraryRequest): Promise<GeoJsonFeatureCollection> {
    return this.client.post<GeoJsonFeatureCollection>({ body: { ...request, format: "geojson" } });
  }
}
