import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestDb } from "../test/db.js";
import { DrizzleFleetRepository } from "./drizzle-fleet-repository.js";
import {
  CapacityVersionConflictError,
  FleetNotFoundError,
  InvalidCapacityRangeError,
  RefreshRejectedError,
} from "./errors.js";
import type { NewFleet, NewLaunchTemplate } from "./fleet-repository.js";
import { InvalidTransitionError, MemberNotFoundError } from "./member-state-machine.js";

const FLEET: NewFleet = {
  id: "web",
  instanceType: "s-1vcpu-1gb",
  amiReference: "ubuntu-24-04-x64",
  subnetIds: ["vpc-a", "vpc-b"],
  desiredCapacity: 2,
  minSize: 1,
  maxSize: 4,
  healthMode: "self-reported",
  trafficTier: "absent",
};

const TEMPLATE: NewLaunchTemplate = {
  instanceType: "s-1vcpu-1gb",
  amiReference: "ubuntu-24-04-x64",
  userData: "#cloud-config\n",
  payloadDigest: "abc123",
};

describe("DrizzleFleetRepository", () => {
  let sqlite: Database.Database;
  let repo: DrizzleFleetRepository;

  beforeEach(() => {
    const t = createTestDb();
    sqlite = t.sqlite;
    repo = new DrizzleFleetRepository(t.db);
  });

  afterEach(() => {
    sqlite.close();
  });

  describe("fleets", () => {
    it("creates a fleet with generation 1 of its template", () => {
      const fleet = repo.createFleet(FLEET, TEMPLATE);

      expect(fleet.id).toBe("web");
      expect(fleet.status).toBe("active");
      expect(fleet.subnetIds).toEqual(["vpc-a", "vpc-b"]);
      expect(fleet.capacity).toEqual({ desiredCapacity: 2, minSize: 1, maxSize: 4, version: 1 });
      expect(repo.getActiveTemplate("web")).toMatchObject({ generation: 1, status: "active", payloadDigest: "abc123" });
    });

    it("refuses an invalid capacity range", () => {
      expect(() => repo.createFleet({ ...FLEET, minSize: 3 }, TEMPLATE)).toThrow(InvalidCapacityRangeError);
      expect(repo.getFleet("web")).toBeNull();
    });

    it("updates fleet attributes", () => {
      repo.createFleet(FLEET, TEMPLATE);
      const updated = repo.updateFleet("web", { firewallId: "fw-1", address: "10.0.0.9" });
      expect(updated.firewallId).toBe("fw-1");
      expect(updated.address).toBe("10.0.0.9");
    });

    it("throws FleetNotFoundError when updating an unknown fleet", () => {
      expect(() => repo.updateFleet("nope", { status: "deleting" })).toThrow(FleetNotFoundError);
    });

    it("deletes a fleet and everything it owns", () => {
      repo.createFleet(FLEET, TEMPLATE);
      repo.insertMember({ fleetId: "web", instanceId: "1", generation: 1, subnetId: "vpc-a", address: null });
      repo.insertRefreshRun({ fleetId: "web", targetGeneration: 1, totalToReplace: 1 });

      repo.deleteFleet("web");

      expect(repo.getFleet("web")).toBeNull();
      expect(repo.listTemplates("web")).toEqual([]);
      expect(repo.listMembers("web")).toEqual([]);
      expect(repo.listRefreshRuns("web")).toEqual([]);
    });
  });

  describe("capacity", () => {
    beforeEach(() => {
      repo.createFleet(FLEET, TEMPLATE);
    });

    it("merges a patch and bumps the version", () => {
      expect(repo.updateCapacity("web", { desiredCapacity: 3 })).toEqual({
        desiredCapacity: 3,
        minSize: 1,
        maxSize: 4,
        version: 2,
      });
      expect(repo.readCapacity("web").version).toBe(2);
    });

    it("compares and swaps on the version", () => {
      repo.updateCapacity("web", { desiredCapacity: 3 }, 1);
      expect(() => repo.updateCapacity("web", { desiredCapacity: 4 }, 1)).toThrow(CapacityVersionConflictError);
      expect(repo.readCapacity("web").desiredCapacity).toBe(3);
    });

    it("keeps the range invariant", () => {
      expect(() => repo.updateCapacity("web", { minSize: 3 })).toThrow(InvalidCapacityRangeError);
      expect(repo.readCapacity("web")).toEqual({ desiredCapacity: 2, minSize: 1, maxSize: 4, version: 1 });
    });

    it("throws for an unknown fleet", () => {
      expect(() => repo.readCapacity("nope")).toThrow("Fleet not found: nope");
    });
  });

  describe("launch templates", () => {
    beforeEach(() => {
      repo.createFleet(FLEET, TEMPLATE);
    });

    it("numbers generations and retires the old one", () => {
      const next = repo.insertTemplate("web", { ...TEMPLATE, amiReference: "ubuntu-24-10-x64" });
      expect(next.generation).toBe(2);
      expect(repo.getActiveTemplate("web")?.generation).toBe(2);

      repo.retireTemplate("web", 1);

      const statuses = repo.listTemplates("web").map((t) => [t.generation, t.status]);
      expect(statuses).toEqual([
        [1, "retired"],
        [2, "active"],
      ]);
      expect(repo.listTemplates("web")[0].retiredAt).not.toBeNull();
    });
  });

  describe("members", () => {
    beforeEach(() => {
      repo.createFleet(FLEET, TEMPLATE);
    });

    it("inserts members as launching", () => {
      const m = repo.insertMember({ fleetId: "web", instanceId: "101", generation: 1, subnetId: "vpc-a", address: null });
      expect(m.status).toBe("launching");
      expect(repo.getMember(m.id)?.instanceId).toBe("101");
    });

    it("lists oldest generation first and filters by status", () => {
      const newer = repo.insertMember({ fleetId: "web", instanceId: "2", generation: 2, subnetId: "vpc-a", address: null });
      const older = repo.insertMember({ fleetId: "web", instanceId: "1", generation: 1, subnetId: "vpc-b", address: null });
      repo.transitionMember(older.id, "in_service");

      expect(repo.listMembers("web").map((m) => m.instanceId)).toEqual(["1", "2"]);
      expect(repo.listMembers("web", ["launching"]).map((m) => m.id)).toEqual([newer.id]);
    });

    it("follows the member state machine", () => {
      const m = repo.insertMember({ fleetId: "web", instanceId: "1", generation: 1, subnetId: "vpc-a", address: null });
      expect(() => repo.transitionMember(m.id, "terminated")).toThrow(InvalidTransitionError);

      repo.transitionMember(m.id, "terminating", { lastError: "health check failed" });
      const done = repo.transitionMember(m.id, "terminated");
      expect(done.status).toBe("terminated");
      expect(done.lastError).toBe("health check failed");
    });

    it("throws for an unknown member", () => {
      expect(() => repo.transitionMember("nope", "in_service")).toThrow(MemberNotFoundError);
    });

    it("records addresses", () => {
      const m = repo.insertMember({ fleetId: "web", instanceId: "1", generation: 1, subnetId: "vpc-a", address: null });
      repo.setMemberAddress(m.id, "10.0.0.5");
      expect(repo.getMember(m.id)?.address).toBe("10.0.0.5");
    });
  });

  describe("refresh runs", () => {
    beforeEach(() => {
      repo.createFleet(FLEET, TEMPLATE);
    });

    it("allows one in-progress run per fleet", () => {
      const run = repo.insertRefreshRun({ fleetId: "web", targetGeneration: 1, totalToReplace: 2 });
      expect(run.status).toBe("in_progress");
      expect(repo.getActiveRefreshRun("web")?.id).toBe(run.id);
      expect(() => repo.insertRefreshRun({ fleetId: "web", targetGeneration: 1, totalToReplace: 2 })).toThrow(
        RefreshRejectedError,
      );
    });

    it("stamps finishedAt on terminal statuses", () => {
      const run = repo.insertRefreshRun({ fleetId: "web", targetGeneration: 1, totalToReplace: 2 });
      const progressed = repo.updateRefreshRun(run.id, { replaced: 1 });
      expect(progressed.finishedAt).toBeNull();

      const done = repo.updateRefreshRun(run.id, { status: "succeeded", replaced: 2 });
      expect(done.finishedAt).not.toBeNull();
      expect(repo.getActiveRefreshRun("web")).toBeNull();
    });

    it("abandons runs left in progress", () => {
      const run = repo.insertRefreshRun({ fleetId: "web", targetGeneration: 1, totalToReplace: 2 });
      expect(repo.abandonStaleRefreshRuns()).toBe(1);
      expect(repo.getRefreshRun(run.id)).toMatchObject({
        status: "abandoned",
        statusReason: "process restarted during refresh",
      });
      expect(repo.abandonStaleRefreshRuns()).toBe(0);
    });
  });
});
