import { randomUUID } from "node:crypto";
import { and, asc, desc, eq, inArray, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { fleetMembers, fleets, launchTemplates, refreshRuns } from "../db/schema/index.js";
import { CapacityVersionConflictError, FleetNotFoundError, RefreshRejectedError } from "./errors.js";
import { assertCapacityRange } from "./fleet-definition.js";
import type {
  FleetMember,
  FleetRecord,
  FleetStatus,
  FleetUpdate,
  IFleetRepository,
  LaunchTemplate,
  LaunchTemplateStatus,
  NewFleet,
  NewFleetMember,
  NewLaunchTemplate,
  RefreshRun,
  RefreshRunStatus,
  RefreshRunUpdate,
} from "./fleet-repository.js";
import {
  ConcurrentTransitionError,
  InvalidTransitionError,
  isMemberStatus,
  isValidTransition,
  MemberNotFoundError,
  type MemberStatus,
} from "./member-state-machine.js";
import type { CapacityPatch, HealthMode, VersionedCapacity } from "./types.js";

type FleetRow = typeof fleets.$inferSelect;
type TemplateRow = typeof launchTemplates.$inferSelect;
type MemberRow = typeof fleetMembers.$inferSelect;
type RunRow = typeof refreshRuns.$inferSelect;

const TERMINAL_RUN_STATUSES: readonly RefreshRunStatus[] = ["succeeded", "failed", "cancelled", "abandoned"];

function now(): number {
  return Math.floor(Date.now() / 1000);
}

/** Narrow a stored enum column, failing loudly on rows written by something else. */
function oneOf<T extends string>(column: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in store: ${value}`);
  }
  return match;
}

function toFleet(row: FleetRow): FleetRecord {
  return {
    id: row.id,
    status: oneOf<FleetStatus>("fleets.status", row.status, ["active", "deleting"]),
    instanceType: row.instanceType,
    amiReference: row.amiReference,
    subnetIds: row.subnetIds,
    capacity: {
      desiredCapacity: row.desiredCapacity,
      minSize: row.minSize,
      maxSize: row.maxSize,
      version: row.capacityVersion,
    },
    healthMode: oneOf<HealthMode>("fleets.health_mode", row.healthMode, ["endpoint-health", "self-reported"]),
    trafficTier: oneOf("fleets.traffic_tier", row.trafficTier, ["absent", "present"]),
    balancerId: row.balancerId,
    firewallId: row.firewallId,
    ingressCidr: row.ingressCidr,
    address: row.address,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toTemplate(row: TemplateRow): LaunchTemplate {
  return {
    ...row,
    status: oneOf<LaunchTemplateStatus>("launch_templates.status", row.status, ["active", "retired"]),
  };
}

function toMember(row: MemberRow): FleetMember {
  if (!isMemberStatus(row.status)) {
    throw new Error(`Unexpected fleet_members.status value in store: ${row.status}`);
  }
  return { ...row, status: row.status };
}

function toRun(row: RunRow): RefreshRun {
  return {
    ...row,
    status: oneOf<RefreshRunStatus>("refresh_runs.status", row.status, [
      "in_progress",
      ...TERMINAL_RUN_STATUSES,
    ]),
  };
}

export class DrizzleFleetRepository implements IFleetRepository {
  constructor(private readonly db: DrizzleDb) {}

  createFleet(fleet: NewFleet, template: NewLaunchTemplate): FleetRecord {
    assertCapacityRange(fleet);
    const ts = now();
    return this.db.transaction((tx) => {
      const row = tx
        .insert(fleets)
        .values({
          id: fleet.id,
          instanceType: fleet.instanceType,
          amiReference: fleet.amiReference,
          subnetIds: [...fleet.subnetIds],
          desiredCapacity: fleet.desiredCapacity,
          minSize: fleet.minSize,
          maxSize: fleet.maxSize,
          healthMode: fleet.healthMode,
          trafficTier: fleet.trafficTier,
          createdAt: ts,
          updatedAt: ts,
        })
        .returning()
        .get();
      tx.insert(launchTemplates)
        .values({ id: randomUUID(), fleetId: fleet.id, generation: 1, status: "active", createdAt: ts, ...template })
        .run();
      return toFleet(row);
    });
  }

  getFleet(id: string): FleetRecord | null {
    const row = this.db.select().from(fleets).where(eq(fleets.id, id)).get();
    return row ? toFleet(row) : null;
  }

  listFleets(): FleetRecord[] {
    return this.db.select().from(fleets).orderBy(asc(fleets.id)).all().map(toFleet);
  }

  updateFleet(id: string, update: FleetUpdate): FleetRecord {
    const row = this.db
      .update(fleets)
      .set({ ...update, updatedAt: now() })
      .where(eq(fleets.id, id))
      .returning()
      .get();
    if (!row) throw new FleetNotFoundError(id);
    return toFleet(row);
  }

  deleteFleet(id: string): void {
    this.db.transaction((tx) => {
      tx.delete(fleetMembers).where(eq(fleetMembers.fleetId, id)).run();
      tx.delete(launchTemplates).where(eq(launchTemplates.fleetId, id)).run();
      tx.delete(refreshRuns).where(eq(refreshRuns.fleetId, id)).run();
      tx.delete(fleets).where(eq(fleets.id, id)).run();
    });
  }

  readCapacity(fleetId: string): VersionedCapacity {
    const fleet = this.getFleet(fleetId);
    if (!fleet) throw new FleetNotFoundError(fleetId);
    return fleet.capacity;
  }

  updateCapacity(fleetId: string, patch: CapacityPatch, expectedVersion?: number): VersionedCapacity {
    return this.db.transaction((tx) => {
      const row = tx.select().from(fleets).where(eq(fleets.id, fleetId)).get();
      if (!row) throw new FleetNotFoundError(fleetId);
      if (expectedVersion !== undefined && expectedVersion !== row.capacityVersion) {
        throw new CapacityVersionConflictError(fleetId, expectedVersion, row.capacityVersion);
      }

      const next = {
        desiredCapacity: patch.desiredCapacity ?? row.desiredCapacity,
        minSize: patch.minSize ?? row.minSize,
        maxSize: patch.maxSize ?? row.maxSize,
      };
      assertCapacityRange(next);

      const updated = tx
        .update(fleets)
        .set({ ...next, capacityVersion: row.capacityVersion + 1, updatedAt: now() })
        .where(and(eq(fleets.id, fleetId), eq(fleets.capacityVersion, row.capacityVersion)))
        .returning()
        .get();
      if (!updated) {
        throw new CapacityVersionConflictError(fleetId, row.capacityVersion, row.capacityVersion + 1);
      }
      return toFleet(updated).capacity;
    });
  }

  insertTemplate(fleetId: string, template: NewLaunchTemplate): LaunchTemplate {
    return this.db.transaction((tx) => {
      const latest = tx
        .select({ generation: launchTemplates.generation })
        .from(launchTemplates)
        .where(eq(launchTemplates.fleetId, fleetId))
        .orderBy(desc(launchTemplates.generation))
        .limit(1)
        .get();
      const row = tx
        .insert(launchTemplates)
        .values({
          id: randomUUID(),
          fleetId,
          generation: (latest?.generation ?? 0) + 1,
          status: "active",
          createdAt: now(),
          ...template,
        })
        .returning()
        .get();
      return toTemplate(row);
    });
  }

  retireTemplate(fleetId: string, generation: number): void {
    this.db
      .update(launchTemplates)
      .set({ status: "retired", retiredAt: now() })
      .where(
        and(
          eq(launchTemplates.fleetId, fleetId),
          eq(launchTemplates.generation, generation),
          eq(launchTemplates.status, "active"),
        ),
      )
      .run();
  }

  getActiveTemplate(fleetId: string): LaunchTemplate | null {
    const row = this.db
      .select()
      .from(launchTemplates)
      .where(and(eq(launchTemplates.fleetId, fleetId), eq(launchTemplates.status, "active")))
      .orderBy(desc(launchTemplates.generation))
      .limit(1)
      .get();
    return row ? toTemplate(row) : null;
  }

  listTemplates(fleetId: string): LaunchTemplate[] {
    return this.db
      .select()
      .from(launchTemplates)
      .where(eq(launchTemplates.fleetId, fleetId))
      .orderBy(asc(launchTemplates.generation))
      .all()
      .map(toTemplate);
  }

  insertMember(member: NewFleetMember): FleetMember {
    const ts = now();
    const row = this.db
      .insert(fleetMembers)
      .values({ id: randomUUID(), status: "launching", launchedAt: ts, updatedAt: ts, ...member })
      .returning()
      .get();
    return toMember(row);
  }

  getMember(id: string): FleetMember | null {
    const row = this.db.select().from(fleetMembers).where(eq(fleetMembers.id, id)).get();
    return row ? toMember(row) : null;
  }

  listMembers(fleetId: string, statuses?: readonly MemberStatus[]): FleetMember[] {
    const where =
      statuses && statuses.length > 0
        ? and(eq(fleetMembers.fleetId, fleetId), inArray(fleetMembers.status, [...statuses]))
        : eq(fleetMembers.fleetId, fleetId);
    return this.db
      .select()
      .from(fleetMembers)
      .where(where)
      .orderBy(asc(fleetMembers.generation), asc(fleetMembers.launchedAt), sql`rowid`)
      .all()
      .map(toMember);
  }

  transitionMember(id: string, to: MemberStatus, details: { lastError?: string } = {}): FleetMember {
    return this.db.transaction((tx) => {
      const current = tx.select().from(fleetMembers).where(eq(fleetMembers.id, id)).get();
      if (!current) throw new MemberNotFoundError(id);
      const from = toMember(current).status;
      if (!isValidTransition(from, to)) {
        throw new InvalidTransitionError(from, to);
      }

      const row = tx
        .update(fleetMembers)
        .set({
          status: to,
          updatedAt: now(),
          ...(details.lastError !== undefined ? { lastError: details.lastError } : {}),
        })
        .where(and(eq(fleetMembers.id, id), eq(fleetMembers.status, from)))
        .returning()
        .get();
      if (!row) throw new ConcurrentTransitionError(id);
      return toMember(row);
    });
  }

  setMemberAddress(id: string, address: string | null): void {
    this.db.update(fleetMembers).set({ address, updatedAt: now() }).where(eq(fleetMembers.id, id)).run();
  }

  insertRefreshRun(run: Pick<RefreshRun, "fleetId" | "targetGeneration" | "totalToReplace">): RefreshRun {
    return this.db.transaction((tx) => {
      const active = tx
        .select({ id: refreshRuns.id })
        .from(refreshRuns)
        .where(and(eq(refreshRuns.fleetId, run.fleetId), eq(refreshRuns.status, "in_progress")))
        .get();
      if (active) {
        throw new RefreshRejectedError(run.fleetId, `refresh ${active.id} is already in progress`);
      }
      const row = tx
        .insert(refreshRuns)
        .values({ id: randomUUID(), status: "in_progress", startedAt: now(), ...run })
        .returning()
        .get();
      return toRun(row);
    });
  }

  getRefreshRun(id: string): RefreshRun | null {
    const row = this.db.select().from(refreshRuns).where(eq(refreshRuns.id, id)).get();
    return row ? toRun(row) : null;
  }

  getActiveRefreshRun(fleetId: string): RefreshRun | null {
    const row = this.db
      .select()
      .from(refreshRuns)
      .where(and(eq(refreshRuns.fleetId, fleetId), eq(refreshRuns.status, "in_progress")))
      .get();
    return row ? toRun(row) : null;
  }

  listRefreshRuns(fleetId: string): RefreshRun[] {
    return this.db
      .select()
      .from(refreshRuns)
      .where(eq(refreshRuns.fleetId, fleetId))
      .orderBy(asc(refreshRuns.startedAt), sql`rowid`)
      .all()
      .map(toRun);
  }

  updateRefreshRun(id: string, update: RefreshRunUpdate): RefreshRun {
    const finished = update.status !== undefined && TERMINAL_RUN_STATUSES.includes(update.status);
    const row = this.db
      .update(refreshRuns)
      .set({ ...update, ...(finished ? { finishedAt: now() } : {}) })
      .where(eq(refreshRuns.id, id))
      .returning()
      .get();
    if (!row) throw new Error(`Refresh run not found: ${id}`);
    return toRun(row);
  }

  abandonStaleRefreshRuns(): number {
    const rows = this.db
      .update(refreshRuns)
      .set({ status: "abandoned", statusReason: "process restarted during refresh", finishedAt: now() })
      .where(eq(refreshRuns.status, "in_progress"))
      .returning({ id: refreshRuns.id })
      .all();
    return rows.length;
  }
}
