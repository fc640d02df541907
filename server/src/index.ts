/**
 * Planloom Server - Main Entry Point
 *
 * Starts the HTTP API over the plan engine.
 */

import { serve } from "@hono/node-server";
import { initServerLogging } from "./logging.js";
import { PORT } from "./config.js";
import { createPlanEngine } from "./engine.js";
import { createApp } from "./app.js";

const logger = initServerLogging();
const log = logger.child({ component: "server.main" });

const engine = createPlanEngine();
const app = createApp(engine);

const server = serve({ fetch: app.fetch, port: PORT }, (info) => {
  log.info(`HTTP API running on http://localhost:${info.port}`);
});

// Graceful shutdown
let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info("Shutting down", { signal });
  server.close();
  await engine.shutdown();
  await logger.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      log.fatal("Shutdown failed", error);
      process.exit(1);
    });
  });
}
