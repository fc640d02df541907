/**
 * HTTP application, separate from the listener so tests can call
 * `app.request()` in-process.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { registerApiRoutes } from "./routes/api.js";
import { registerTaskRoutes } from "./routes/tasks.js";
import type { PlanEngine } from "./engine.js";

export function createApp(engine: PlanEngine): Hono {
  const app = new Hono();
  app.use("/*", cors());
  registerApiRoutes(app, engine);
  registerTaskRoutes(app, engine);
  return app;
}
