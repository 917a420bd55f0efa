import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createTestDb } from "../test/db.js";
import { type CapacityGroupDeps, CapacityGroupController } from "./capacity-group.js";
import { DrizzleFleetRepository } from "./drizzle-fleet-repository.js";
import { FleetNotFoundError } from "./errors.js";
import { FleetRegistry } from "./fleet-registry.js";
import type { InstanceDriver } from "./instance-driver.js";
import { HttpRefreshApi, LocalRefreshApi, RefreshApiError } from "./refresh-api.js";

function makeDriver(): InstanceDriver {
  let next = 1;
  return {
    launch: vi.fn(async () => ({ instanceId: String(next++), state: "pending" as const, address: null })),
    describe: vi.fn(async (instanceId: string) => ({ instanceId, state: "running" as const, address: null })),
    terminate: vi.fn(async () => {}),
  };
}

describe("LocalRefreshApi", () => {
  let sqlite: Database.Database;
  let repo: DrizzleFleetRepository;
  let registry: FleetRegistry;
  let api: LocalRefreshApi;
  let depsFor: () => CapacityGroupDeps;

  beforeEach(async () => {
    const t = createTestDb();
    sqlite = t.sqlite;
    repo = new DrizzleFleetRepository(t.db);
    const driver = makeDriver();
    depsFor = () => ({
      repo,
      driver,
      probe: { mode: "self-reported", isHealthy: async () => true },
      schedule: { minHealthyPercentage: 90, instanceWarmupSeconds: 0 },
      sleep: async () => {},
    });
    registry = new FleetRegistry(repo, depsFor);
    api = new LocalRefreshApi(registry);
    await CapacityGroupController.create(
      depsFor(),
      {
        id: "web",
        instanceType: "s-1vcpu-1gb",
        amiReference: "ubuntu-24-04-x64",
        subnetIds: ["vpc-a"],
        desiredCapacity: 1,
        minSize: 1,
        maxSize: 2,
        healthMode: "self-reported",
        trafficTier: "absent",
      },
      { instanceType: "s-1vcpu-1gb", amiReference: "ubuntu-24-04-x64", userData: "", payloadDigest: "d" },
    );
  });

  afterEach(() => {
    sqlite.close();
  });

  it("describes a stored fleet and returns null for an unknown one", async () => {
    expect(await api.describe("web")).toMatchObject({ fleetId: "web", members: { launching: 1 } });
    expect(await api.describe("nope")).toBeNull();
  });

  it("loads one controller per fleet so duplicate triggers collapse", async () => {
    const first = await api.startRefresh("web");
    const second = await api.startRefresh("web");

    expect(first).toMatchObject({ outcome: "accepted", alreadyInProgress: false });
    expect(second).toEqual({
      outcome: "accepted",
      refreshId: first.outcome === "accepted" ? first.refreshId : "",
      alreadyInProgress: true,
    });
    expect(registry.get("web")).toBe(registry.get("web"));
    await registry.get("web")?.waitForRefresh();
  });

  it("turns a refused refresh into a rejected result", async () => {
    repo.updateFleet("web", { status: "deleting" });
    expect(await api.startRefresh("web")).toEqual({ outcome: "rejected", reason: "fleet is being deleted" });
  });

  it("throws FleetNotFoundError for an unknown fleet", async () => {
    await expect(api.startRefresh("nope")).rejects.toThrow(FleetNotFoundError);
  });

  it("lists only active fleets", () => {
    expect(registry.list().map((c) => c.fleetId)).toEqual(["web"]);
    repo.updateFleet("web", { status: "deleting" });
    expect(registry.list()).toEqual([]);
  });
});

describe("HttpRefreshApi", () => {
  const api = new HttpRefreshApi({ baseUrl: "http://orchestrator:3100/", token: "test-secret" });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function respond(status: number, body: unknown) {
    return vi.fn().mockResolvedValue({
      ok: status >= 200 && status < 300,
      status,
      statusText: `HTTP ${status}`,
      json: () => Promise.resolve(body),
    });
  }

  const state = {
    fleetId: "web",
    status: "active",
    healthMode: "self-reported",
    capacity: { desiredCapacity: 1, minSize: 1, maxSize: 2, version: 1 },
    activeGeneration: 1,
    members: { launching: 0, in_service: 1, unhealthy: 0, terminating: 0, terminated: 0 },
    activeRefresh: null,
    address: null,
  };

  it("describes a fleet with the bearer token", async () => {
    const fetchMock = respond(200, state);
    vi.stubGlobal("fetch", fetchMock);

    expect(await api.describe("web")).toEqual(state);
    expect(fetchMock).toHaveBeenCalledWith("http://orchestrator:3100/fleets/web", {
      method: "GET",
      headers: { Authorization: "Bearer test-secret", "Content-Type": "application/json" },
    });
  });

  it("returns null on 404", async () => {
    vi.stubGlobal("fetch", respond(404, { error: "Fleet not found: web" }));
    expect(await api.describe("web")).toBeNull();
  });

  it("raises RefreshApiError with the status", async () => {
    vi.stubGlobal("fetch", respond(403, { error: "Insufficient scope" }));
    const err = await api.describe("web").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RefreshApiError);
    expect(err).toMatchObject({ status: 403, message: "Fleet API error 403: Insufficient scope" });
  });

  it("starts a refresh", async () => {
    const fetchMock = respond(202, { refreshId: "run-1", alreadyInProgress: false });
    vi.stubGlobal("fetch", fetchMock);

    expect(await api.startRefresh("web")).toEqual({ outcome: "accepted", refreshId: "run-1", alreadyInProgress: false });
    expect(fetchMock).toHaveBeenCalledWith("http://orchestrator:3100/fleets/web/refresh", expect.objectContaining({ method: "POST" }));
  });

  it("maps 409 to a rejection and 404 to FleetNotFoundError", async () => {
    vi.stubGlobal("fetch", respond(409, { error: "Refresh rejected", reason: "fleet is being deleted" }));
    expect(await api.startRefresh("web")).toEqual({ outcome: "rejected", reason: "fleet is being deleted" });

    vi.stubGlobal("fetch", respond(404, { error: "Fleet not found: web" }));
    await expect(api.startRefresh("web")).rejects.toThrow(FleetNotFoundError);
  });
});
