import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import type { FleetRegistry } from "../fleet/fleet-registry.js";
import { createFleetRoutes, type FleetRouteDeps } from "./routes/fleets.js";
import { createHealthRoutes } from "./routes/health.js";

// Global error handler: anything a route did not map becomes a logged 500.
export const errorHandler: Parameters<Hono["onError"]>[0] = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

function summarizeFleets(registry: FleetRegistry) {
  const controllers = registry.list();
  return {
    active: controllers.length,
    refreshing: controllers.filter((c) => c.refreshInProgress).length,
  };
}

/** The HTTP surface: public `/health` plus the token-scoped `/fleets` API. */
export function createApp(deps: FleetRouteDeps): Hono {
  const app = new Hono();

  app.use("/*", secureHeaders());

  app.route("/health", createHealthRoutes(() => summarizeFleets(deps.registry)));
  app.route("/fleets", createFleetRoutes(deps));

  app.onError(errorHandler);
  return app;
}
