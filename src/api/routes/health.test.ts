import { describe, expect, it } from "vitest";
import { createHealthRoutes } from "./health.js";

describe("health routes", () => {
  it("returns ok without a summary source", async () => {
    const routes = createHealthRoutes();
    const res = await routes.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", service: "fleet-orchestrator" });
  });

  it("includes fleet counts", async () => {
    const routes = createHealthRoutes(() => ({ active: 2, refreshing: 1 }));
    const res = await routes.request("/");
    expect(await res.json()).toEqual({
      status: "ok",
      service: "fleet-orchestrator",
      fleets: { active: 2, refreshing: 1 },
    });
  });

  it("reports degraded when the summary throws", async () => {
    const routes = createHealthRoutes(() => {
      throw new Error("database is locked");
    });
    const res = await routes.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "degraded", service: "fleet-orchestrator" });
  });
});
