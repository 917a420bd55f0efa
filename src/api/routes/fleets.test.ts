import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";

vi.mock("../../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { buildTokenMap } from "../../auth/index.js";
import { type CapacityGroupDeps, CapacityGroupController } from "../../fleet/capacity-group.js";
import { DrizzleFleetRepository } from "../../fleet/drizzle-fleet-repository.js";
import { FleetNotFoundError } from "../../fleet/errors.js";
import type { FleetProvisioner } from "../../fleet/fleet-provisioner.js";
import { FleetRegistry } from "../../fleet/fleet-registry.js";
import type { InstanceDriver } from "../../fleet/instance-driver.js";
import { LocalRefreshApi } from "../../fleet/refresh-api.js";
import { createTestDb } from "../../test/db.js";
import { createFleetRoutes } from "./fleets.js";

const READ = { Authorization: "Bearer read-token" };
const DISPATCHER = { Authorization: "Bearer dispatch-token" };
const ADMIN = { Authorization: "Bearer admin-token" };

const tokenMap = buildTokenMap({
  FLEET_API_TOKEN_READ: "read-token",
  FLEET_API_TOKEN_DISPATCHER: "dispatch-token",
  FLEET_API_TOKEN_ADMIN: "admin-token",
});

function json(headers: Record<string, string>, body: unknown) {
  return { headers: { ...headers, "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

describe("fleet routes", () => {
  let sqlite: Database.Database;
  let registry: FleetRegistry;
  let teardown: Mock<FleetProvisioner["teardown"]>;
  let routes: ReturnType<typeof createFleetRoutes>;
  let launchGate: Promise<void>;
  let releaseLaunches: () => void;

  beforeEach(async () => {
    const t = createTestDb();
    sqlite = t.sqlite;
    const repo = new DrizzleFleetRepository(t.db);
    launchGate = Promise.resolve();
    releaseLaunches = () => {};
    let next = 1;
    const driver: InstanceDriver = {
      launch: async () => {
        await launchGate;
        return { instanceId: String(next++), state: "pending", address: null };
      },
      describe: async (instanceId) => ({ instanceId, state: "running", address: null }),
      terminate: async () => {},
    };
    const depsFor = (): CapacityGroupDeps => ({
      repo,
      driver,
      probe: { mode: "self-reported", isHealthy: async () => true },
      schedule: { minHealthyPercentage: 90, instanceWarmupSeconds: 0 },
      sleep: async () => {},
    });
    registry = new FleetRegistry(repo, depsFor);
    registry.register(
      await CapacityGroupController.create(
        depsFor(),
        {
          id: "web",
          instanceType: "s-1vcpu-1gb",
          amiReference: "ubuntu-24-04-x64",
          subnetIds: ["vpc-a"],
          desiredCapacity: 1,
          minSize: 1,
          maxSize: 3,
          healthMode: "self-reported",
          trafficTier: "absent",
        },
        { instanceType: "s-1vcpu-1gb", amiReference: "ubuntu-24-04-x64", userData: "", payloadDigest: "d" },
      ),
    );
    teardown = vi.fn<FleetProvisioner["teardown"]>();
    routes = createFleetRoutes({
      registry,
      refreshApi: new LocalRefreshApi(registry),
      provisioner: { teardown },
      tokenMap,
    });
  });

  afterEach(async () => {
    releaseLaunches();
    await registry.get("web")?.waitForRefresh();
    sqlite.close();
  });

  function holdLaunches(): void {
    launchGate = new Promise((resolve) => {
      releaseLaunches = resolve;
    });
  }

  describe("GET /:id", () => {
    it("describes the fleet with a read token", async () => {
      const res = await routes.request("/web", { headers: READ });
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.fleetId).toBe("web");
      expect(body.capacity).toEqual({ desiredCapacity: 1, minSize: 1, maxSize: 3, version: 1 });
    });

    it("returns 404 for an unknown fleet", async () => {
      const res = await routes.request("/nope", { headers: READ });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Fleet not found: nope" });
    });

    it("requires a token", async () => {
      const res = await routes.request("/web");
      expect(res.status).toBe(401);
    });
  });

  describe("POST /:id/refresh", () => {
    it("accepts a refresh and joins it on a repeat call", async () => {
      holdLaunches();
      const first = await routes.request("/web/refresh", { method: "POST", headers: DISPATCHER });
      expect(first.status).toBe(202);
      const started = await first.json();
      expect(started.alreadyInProgress).toBe(false);

      const second = await routes.request("/web/refresh", { method: "POST", headers: DISPATCHER });
      expect(second.status).toBe(202);
      expect(await second.json()).toEqual({ refreshId: started.refreshId, alreadyInProgress: true });
    });

    it("forbids a read token", async () => {
      const res = await routes.request("/web/refresh", { method: "POST", headers: READ });
      expect(res.status).toBe(403);
    });

    it("returns 404 for an unknown fleet", async () => {
      const res = await routes.request("/nope/refresh", { method: "POST", headers: DISPATCHER });
      expect(res.status).toBe(404);
    });

    it("returns 409 while the fleet is being deleted", async () => {
      const controller = registry.get("web");
      await controller?.delete();
      const res = await routes.request("/web/refresh", { method: "POST", headers: DISPATCHER });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: "Refresh rejected", reason: "fleet is being deleted" });
    });
  });

  describe("PUT /:id/capacity", () => {
    it("forbids the dispatcher token", async () => {
      const res = await routes.request("/web/capacity", { method: "PUT", ...json(DISPATCHER, { desiredCapacity: 2 }) });
      expect(res.status).toBe(403);
    });

    it("applies an edit and bumps the version", async () => {
      const res = await routes.request("/web/capacity", { method: "PUT", ...json(ADMIN, { desiredCapacity: 2 }) });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ desiredCapacity: 2, minSize: 1, maxSize: 3, version: 2 });
    });

    it("rejects an out-of-range edit", async () => {
      const res = await routes.request("/web/capacity", { method: "PUT", ...json(ADMIN, { desiredCapacity: 9 }) });
      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toBe("Invalid capacity range: expected minSize (1) <= desiredCapacity (9) <= maxSize (3)");
    });

    it("rejects a stale version", async () => {
      const res = await routes.request("/web/capacity", {
        method: "PUT",
        ...json(ADMIN, { desiredCapacity: 2, expectedVersion: 5 }),
      });
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: "Capacity of fleet web is at version 1, not 5", version: 1 });
    });

    it("rejects unknown fields", async () => {
      const res = await routes.request("/web/capacity", { method: "PUT", ...json(ADMIN, { replicas: 2 }) });
      expect(res.status).toBe(400);
      expect((await res.json()).error).toBe("Validation failed");
    });

    it("rejects a body that is not JSON", async () => {
      const res = await routes.request("/web/capacity", {
        method: "PUT",
        headers: { ...ADMIN, "Content-Type": "application/json" },
        body: "{",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Invalid JSON body" });
    });
  });

  describe("POST /:id/template", () => {
    it("activates a new generation and starts a refresh", async () => {
      holdLaunches();
      const res = await routes.request("/web/template", {
        method: "POST",
        ...json(ADMIN, { amiReference: "ubuntu-26-04-x64" }),
      });
      expect(res.status).toBe(202);
      const body = await res.json();
      expect(body.generation).toBe(2);
      expect(body.alreadyInProgress).toBe(false);
    });
  });

  describe("DELETE /:id", () => {
    it("tears the fleet down", async () => {
      teardown.mockResolvedValue({
        fleetId: "web",
        cancelledRefreshId: null,
        terminated: ["1"],
        orphans: [],
        balancerDeleted: true,
        firewallDeleted: true,
      });
      const res = await routes.request("/web", { method: "DELETE", headers: ADMIN });
      expect(res.status).toBe(200);
      expect((await res.json()).terminated).toEqual(["1"]);
      expect(teardown).toHaveBeenCalledWith("web");
    });

    it("returns 404 for an unknown fleet", async () => {
      teardown.mockRejectedValue(new FleetNotFoundError("nope"));
      const res = await routes.request("/nope", { method: "DELETE", headers: ADMIN });
      expect(res.status).toBe(404);
    });
  });
});
