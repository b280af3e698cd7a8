import { Router, type Request, type Response } from "express";
import { coverageRequestSchema } from "../models/requests.js";
import type { CoverageService } from "../services/coverage.service.js";

export class CoverageController {
  constructor(private readonly service: CoverageService) {}

  /** Tile the requested areas with sampling circles */
  public generate(req: Request, res: Response): void {
    const body = coverageRequestSchema.parse(req.body);
    switch (body.format) {
      case "csv":
        res.type("text/csv").send(this.service.generateCsv(body));
        return;
      case "geojson":
        res.json(this.service.generateGeoJson(body));
        return;
      default:
        res.json(this.service.generate(body));
    }
  }

  public router(): Router {
    const router = Router();
    router.post("/", (req, res) => this.generate(req, res));
    return router;
  }
}
