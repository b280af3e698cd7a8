import express from "express";
import cors from "cors";
import { loadPlannerConfig, type PlannerConfig } from "@placegrid/engine";
import { CoverageController } from "./controllers/coverage.controller.js";
import { ItineraryController } from "./controllers/itinerary.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { CoverageService } from "./services/coverage.service.js";
import { ItineraryService } from "./services/itinerary.service.js";
import { errorHandler } from "./middleware/error-handler.js";

export function createApp(config: PlannerConfig = loadPlannerConfig()): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  const health = new HealthController();
  app.get("/health", (_req, res) => {
    res.json(health.getHealth());
  });

  app.use("/api/coverage", new CoverageController(new CoverageService(config)).router());
  app.use("/api/itinerary", new ItineraryController(new ItineraryService(config)).router());

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
