import type { HealthResponse } from "../models/responses.js";

export class HealthController {
  /** Liveness check */
  public getHealth(): HealthResponse {
    return {
      status: "ok",
      uptime: process.uptime(),
    };
  }
}
