import { Hono } from "hono";

export interface FleetSummary {
  active: number;
  refreshing: number;
}

/**
 * Public, unauthenticated health check used by load balancers and monitoring.
 * Fleet counts are included when a summary source is wired in.
 */
export function createHealthRoutes(summarize?: () => FleetSummary): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const health: { status: string; service: string; fleets?: FleetSummary } = {
      status: "ok",
      service: "fleet-orchestrator",
    };

    if (summarize) {
      try {
        health.fleets = summarize();
      } catch {
        // State DB unreadable: report degraded instead of failing the probe
        health.status = "degraded";
      }
    }

    return c.json(health);
  });

  return routes;
}
