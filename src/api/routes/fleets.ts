import type { Context } from "hono";
import { Hono } from "hono";
import type { TokenScope } from "../../auth/index.js";
import { requirePermission } from "../../auth/index.js";
import { logger } from "../../config/logger.js";
import {
  CapacityVersionConflictError,
  FleetNotFoundError,
  InvalidConfigurationError,
  RefreshRejectedError,
} from "../../fleet/errors.js";
import type { FleetProvisioner } from "../../fleet/fleet-provisioner.js";
import type { FleetRegistry } from "../../fleet/fleet-registry.js";
import type { RefreshTriggerApi } from "../../fleet/refresh-api.js";
import { capacityPatchSchema, templateChangeSchema } from "../../fleet/types.js";

export interface FleetRouteDeps {
  registry: FleetRegistry;
  refreshApi: RefreshTriggerApi;
  provisioner: Pick<FleetProvisioner, "teardown">;
  tokenMap: Map<string, TokenScope>;
}

/** Map fleet errors onto status codes; anything else is a 500. */
function errorResponse(c: Context, err: unknown) {
  if (err instanceof FleetNotFoundError) {
    return c.json({ error: err.message }, 404);
  }
  if (err instanceof InvalidConfigurationError) {
    return c.json({ error: err.message, issues: err.issues }, 400);
  }
  if (err instanceof CapacityVersionConflictError) {
    return c.json({ error: err.message, version: err.actualVersion }, 409);
  }
  if (err instanceof RefreshRejectedError) {
    return c.json({ error: "Refresh rejected", reason: err.reason }, 409);
  }
  logger.error("Fleet route failed", { path: c.req.path, error: err instanceof Error ? err.message : String(err) });
  return c.json({ error: "Internal server error" }, 500);
}

async function readJson(c: Context): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await c.req.json() };
  } catch {
    return { ok: false };
  }
}

/**
 * REST surface over the fleet registry, mounted at `/fleets`.
 * Every route needs a bearer token; see `requirePermission` for scopes.
 */
export function createFleetRoutes(deps: FleetRouteDeps): Hono {
  const routes = new Hono();
  const { registry, refreshApi, provisioner, tokenMap } = deps;

  if (tokenMap.size === 0) {
    logger.warn("No API tokens configured; fleet routes will reject all requests");
  }

  /** GET /fleets/:id: current fleet state */
  routes.get("/:id", requirePermission(tokenMap, "fleet:describe"), async (c) => {
    const id = c.req.param("id");
    const state = await refreshApi.describe(id);
    if (!state) return c.json({ error: `Fleet not found: ${id}` }, 404);
    return c.json(state);
  });

  /** POST /fleets/:id/refresh: start a rolling refresh, or join the running one */
  routes.post("/:id/refresh", requirePermission(tokenMap, "fleet:refresh"), async (c) => {
    try {
      const result = await refreshApi.startRefresh(c.req.param("id"));
      if (result.outcome === "rejected") {
        return c.json({ error: "Refresh rejected", reason: result.reason }, 409);
      }
      return c.json({ refreshId: result.refreshId, alreadyInProgress: result.alreadyInProgress }, 202);
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  /** PUT /fleets/:id/capacity: edit the capacity range */
  routes.put("/:id/capacity", requirePermission(tokenMap, "fleet:admin"), async (c) => {
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: "Invalid JSON body" }, 400);
    const parsed = capacityPatchSchema.safeParse(json.body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }

    const controller = registry.get(c.req.param("id"));
    if (!controller) return c.json({ error: `Fleet not found: ${c.req.param("id")}` }, 404);
    const { expectedVersion, ...patch } = parsed.data;
    try {
      return c.json(controller.updateCapacity(patch, expectedVersion));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  /** POST /fleets/:id/template: new launch template generation plus a refresh onto it */
  routes.post("/:id/template", requirePermission(tokenMap, "fleet:admin"), async (c) => {
    const json = await readJson(c);
    if (!json.ok) return c.json({ error: "Invalid JSON body" }, 400);
    const parsed = templateChangeSchema.safeParse(json.body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }

    const controller = registry.get(c.req.param("id"));
    if (!controller) return c.json({ error: `Fleet not found: ${c.req.param("id")}` }, 404);
    try {
      return c.json(controller.replaceTemplate(parsed.data), 202);
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  /** DELETE /fleets/:id: forceful teardown */
  routes.delete("/:id", requirePermission(tokenMap, "fleet:admin"), async (c) => {
    try {
      return c.json(await provisioner.teardown(c.req.param("id")));
    } catch (err) {
      return errorResponse(c, err);
    }
  });

  return routes;
}
