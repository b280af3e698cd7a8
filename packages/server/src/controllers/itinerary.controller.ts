import { Router, type Request, type Response } from "express";
import { itineraryRequestSchema } from "../models/requests.js";
import type { ItineraryService } from "../services/itinerary.service.js";

export class ItineraryController {
  constructor(private readonly service: ItineraryService) {}

  /** Order scored candidates into a visiting sequence */
  public build(req: Request, res: Response): void {
    const body = itineraryRequestSchema.parse(req.body);
    if (body.format === "geojson") {
      res.json(this.service.buildGeoJson(body));
      return;
    }
    res.json(this.service.build(body));
  }

  public router(): Router {
    const router = Router();
    router.post("/", (req, res) => this.build(req, res));
    return router;
  }
}
