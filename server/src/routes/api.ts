/**
 * API Routes
 *
 * Health check and service info.
 */

import type { Hono } from "hono";
import type { PlanEngine } from "../engine.js";

export function registerApiRoutes(app: Hono, engine: PlanEngine): void {
  app.get("/", (c) => c.json({
    service: "planloom",
    version: "0.1.0",
    status: "running",
  }));

  app.get("/api/health", (c) => c.json({
    status: "ok",
    tools: engine.registry.names(),
    background: engine.background.stats(),
  }));
}
