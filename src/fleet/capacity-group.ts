import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { logger } from "../config/logger.js";
import { FleetNotFoundError, RefreshRejectedError } from "./errors.js";
import { assertCapacityRange } from "./fleet-definition.js";
import type {
  FleetMember,
  FleetRecord,
  IFleetRepository,
  LaunchTemplate,
  NewFleet,
  NewLaunchTemplate,
  RefreshRun,
} from "./fleet-repository.js";
import type { HealthProbe } from "./health-probe.js";
import type { InstanceDriver } from "./instance-driver.js";
import { LIVE_STATUSES, type MemberStatus } from "./member-state-machine.js";
import { RollingRefresh, type Sleep } from "./rolling-refresh.js";
import { fleetTag } from "./traffic-tier.js";
import type { CapacityPatch, HealthMode, RefreshSchedule, TemplateChange, VersionedCapacity } from "./types.js";

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export interface CapacityGroupDeps {
  repo: IFleetRepository;
  driver: InstanceDriver;
  probe: HealthProbe;
  schedule: Pick<RefreshSchedule, "minHealthyPercentage" | "instanceWarmupSeconds">;
  sleep?: Sleep;
  /** How long a new member gets to pass its first health check */
  healthTimeoutMs?: number;
  healthPollMs?: number;
}

export interface RefreshStart {
  refreshId: string;
  alreadyInProgress: boolean;
}

export interface TemplateReplacement extends RefreshStart {
  generation: number;
}

export interface HealthReport {
  promoted: string[];
  markedUnhealthy: string[];
  lost: string[];
}

export interface ReconcileReport extends HealthReport {
  skipped: "refresh_in_progress" | "deleting" | "busy" | null;
  launched: string[];
  terminated: string[];
}

export interface OrphanedInstance {
  instanceId: string;
  error: string;
}

export interface TeardownReport {
  fleetId: string;
  cancelledRefreshId: string | null;
  terminated: string[];
  orphans: OrphanedInstance[];
}

/** Snapshot served by the refresh trigger API and `GET /fleets/:id`. */
export interface FleetState {
  fleetId: string;
  status: FleetRecord["status"];
  healthMode: HealthMode;
  capacity: VersionedCapacity;
  activeGeneration: number | null;
  members: Record<MemberStatus, number>;
  activeRefresh: Pick<RefreshRun, "id" | "targetGeneration" | "totalToReplace" | "replaced" | "startedAt"> | null;
  address: string | null;
}

interface ActiveRefresh {
  runId: string;
  abort: AbortController;
  done: Promise<RefreshRun>;
}

function skippedReconcile(skipped: ReconcileReport["skipped"]): ReconcileReport {
  return { promoted: [], markedUnhealthy: [], lost: [], launched: [], terminated: [], skipped };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns one fleet's members: keeps capacity within range, replaces unhealthy
 * members and runs rolling refreshes. All state lives in the repository, so
 * a controller can be rebuilt from the store with `load()` at any time.
 */
export class CapacityGroupController {
  readonly fleetId: string;
  private readonly repo: IFleetRepository;
  private readonly driver: InstanceDriver;
  private readonly probe: HealthProbe;
  private readonly schedule: CapacityGroupDeps["schedule"];
  private readonly sleep: Sleep;
  private readonly healthTimeoutMs: number;
  private readonly healthPollMs: number;
  private active: ActiveRefresh | null = null;
  private reconcilePass: Promise<ReconcileReport> | null = null;
  private deleting = false;

  private constructor(fleetId: string, deps: CapacityGroupDeps) {
    this.fleetId = fleetId;
    this.repo = deps.repo;
    this.driver = deps.driver;
    this.probe = deps.probe;
    this.schedule = deps.schedule;
    this.sleep = deps.sleep ?? defaultSleep;
    this.healthTimeoutMs = deps.healthTimeoutMs ?? 600_000;
    this.healthPollMs = deps.healthPollMs ?? 10_000;
  }

  /**
   * Validate the range, persist the fleet with generation 1 of its template
   * and launch `desiredCapacity` members.
   */
  static async create(deps: CapacityGroupDeps, fleet: NewFleet, template: NewLaunchTemplate): Promise<CapacityGroupController> {
    assertCapacityRange(fleet);
    if (fleet.healthMode !== deps.probe.mode) {
      throw new Error(`Fleet ${fleet.id} wants ${fleet.healthMode} health but the probe is ${deps.probe.mode}`);
    }
    deps.repo.createFleet(fleet, template);
    const controller = new CapacityGroupController(fleet.id, deps);
    for (let i = 0; i < fleet.desiredCapacity; i++) {
      await controller.launchMember();
    }
    logger.info(`Fleet ${fleet.id} created`, { desiredCapacity: fleet.desiredCapacity, healthMode: fleet.healthMode });
    return controller;
  }

  /** Rebuild a controller for a stored fleet. */
  static load(deps: CapacityGroupDeps, fleetId: string): CapacityGroupController {
    if (!deps.repo.getFleet(fleetId)) throw new FleetNotFoundError(fleetId);
    return new CapacityGroupController(fleetId, deps);
  }

  get healthMode(): HealthMode {
    return this.probe.mode;
  }

  get refreshInProgress(): boolean {
    return this.active !== null;
  }

  /**
   * Record a refresh run and drive it in the background. While one is in
   * progress, returns that run instead of starting another.
   */
  startRollingRefresh(): RefreshStart {
    if (this.active) {
      return { refreshId: this.active.runId, alreadyInProgress: true };
    }
    this.assertNotDeleting();
    const stale = this.repo.getActiveRefreshRun(this.fleetId);
    if (stale) {
      // Left behind by another controller instance; this one cannot drive it.
      this.repo.updateRefreshRun(stale.id, { status: "abandoned", statusReason: "superseded by a new refresh" });
    }
    const template = this.requireActiveTemplate();
    const targets = this.repo.listMembers(this.fleetId, LIVE_STATUSES);
    const run = this.repo.insertRefreshRun({
      fleetId: this.fleetId,
      targetGeneration: template.generation,
      totalToReplace: targets.length,
    });

    const abort = new AbortController();
    const refresh = new RollingRefresh({
      repo: this.repo,
      fleetId: this.fleetId,
      ops: this,
      sleep: this.sleep,
      minHealthyPercentage: this.schedule.minHealthyPercentage,
      instanceWarmupSeconds: this.schedule.instanceWarmupSeconds,
      floorRecheckMs: this.healthPollMs,
    });
    const done = refresh.run(run, targets, abort.signal).finally(() => {
      if (this.active?.runId === run.id) this.active = null;
    });
    this.active = { runId: run.id, abort, done };

    logger.info(`Rolling refresh ${run.id} started`, {
      fleetId: this.fleetId,
      targetGeneration: template.generation,
      totalToReplace: targets.length,
    });
    return { refreshId: run.id, alreadyInProgress: false };
  }

  /** Resolves when the in-progress refresh (if any) reaches a terminal status. */
  async waitForRefresh(): Promise<RefreshRun | null> {
    return this.active ? this.active.done : null;
  }

  /**
   * Create-before-replace: insert the new generation, retire the old one,
   * then roll running members onto the new generation. A refresh already in
   * progress picks the new generation up before it finishes.
   */
  replaceTemplate(change: TemplateChange): TemplateReplacement {
    this.assertNotDeleting();
    const current = this.requireActiveTemplate();
    const next = this.repo.insertTemplate(this.fleetId, {
      instanceType: change.instanceType ?? current.instanceType,
      amiReference: change.amiReference ?? current.amiReference,
      userData: current.userData,
      payloadDigest: current.payloadDigest,
    });
    this.repo.retireTemplate(this.fleetId, current.generation);
    this.repo.updateFleet(this.fleetId, { instanceType: next.instanceType, amiReference: next.amiReference });
    logger.info(`Fleet ${this.fleetId} template generation ${next.generation} active`, {
      retired: current.generation,
    });
    return { generation: next.generation, ...this.startRollingRefresh() };
  }

  /** External capacity edit; compare-and-swap on `expectedVersion` when given. */
  updateCapacity(patch: CapacityPatch, expectedVersion?: number): VersionedCapacity {
    const capacity = this.repo.updateCapacity(this.fleetId, patch, expectedVersion);
    logger.info(`Fleet ${this.fleetId} capacity updated`, { ...capacity });
    return capacity;
  }

  /** Re-probe every live member and move it along the state machine. */
  async refreshMemberHealth(): Promise<HealthReport> {
    const report: HealthReport = { promoted: [], markedUnhealthy: [], lost: [] };
    for (const member of this.repo.listMembers(this.fleetId, LIVE_STATUSES)) {
      if (this.deleting) break;
      const desc = await this.driver.describe(member.instanceId);
      if (desc.state === "gone") {
        const current = this.repo.getMember(member.id);
        if (!current || !LIVE_STATUSES.includes(current.status)) continue;
        this.repo.transitionMember(member.id, "terminating", { lastError: "instance disappeared" });
        this.repo.transitionMember(member.id, "terminated");
        report.lost.push(member.instanceId);
        continue;
      }
      if (desc.address && desc.address !== member.address) {
        this.repo.setMemberAddress(member.id, desc.address);
      }
      const healthy = await this.probe.isHealthy({ instanceId: member.instanceId, address: desc.address ?? member.address });
      const latest = this.repo.getMember(member.id);
      if (!latest) continue;
      if (healthy && (latest.status === "launching" || latest.status === "unhealthy")) {
        this.repo.transitionMember(member.id, "in_service");
        report.promoted.push(member.instanceId);
      } else if (!healthy && latest.status === "in_service") {
        this.repo.transitionMember(member.id, "unhealthy", { lastError: `${this.probe.mode} check failed` });
        report.markedUnhealthy.push(member.instanceId);
      } else if (!healthy && latest.status === "launching" && this.launchExpired(latest)) {
        this.repo.transitionMember(member.id, "unhealthy", { lastError: "never passed its first health check" });
        report.markedUnhealthy.push(member.instanceId);
      }
    }
    return report;
  }

  /**
   * Self-healing pass: replace unhealthy members, then converge on
   * desiredCapacity. Only re-probes health while a refresh is running.
   * Deletion or a refresh starting part-way through stops the pass at the
   * next step.
   */
  reconcile(): Promise<ReconcileReport> {
    if (this.deleting) return Promise.resolve(skippedReconcile("deleting"));
    if (this.reconcilePass) return Promise.resolve(skippedReconcile("busy"));
    const pass = this.runReconcile().finally(() => {
      this.reconcilePass = null;
    });
    this.reconcilePass = pass;
    return pass;
  }

  private async runReconcile(): Promise<ReconcileReport> {
    const health = await this.refreshMemberHealth();
    const report: ReconcileReport = { ...health, skipped: null, launched: [], terminated: [] };
    const halted = (): boolean => {
      report.skipped = this.deleting ? "deleting" : this.active ? "refresh_in_progress" : null;
      return report.skipped !== null;
    };
    if (halted()) return report;

    for (const member of this.repo.listMembers(this.fleetId, ["unhealthy"])) {
      const replacement = await this.launchMember();
      report.launched.push(replacement.instanceId);
      if (halted()) return report;
      const latest = this.repo.getMember(member.id);
      if (latest?.status !== "unhealthy") continue;
      await this.terminateMember(latest, "replaced after failing health checks");
      report.terminated.push(member.instanceId);
      if (halted()) return report;
    }

    const capacity = this.repo.readCapacity(this.fleetId);
    for (let n = this.repo.listMembers(this.fleetId, LIVE_STATUSES).length; n < capacity.desiredCapacity; n++) {
      const member = await this.launchMember();
      report.launched.push(member.instanceId);
      if (halted()) return report;
    }

    // Unproven members go first; in-service members never drop below minSize.
    for (;;) {
      const { desiredCapacity, minSize } = this.repo.readCapacity(this.fleetId);
      const live = this.repo.listMembers(this.fleetId, LIVE_STATUSES);
      if (live.length <= desiredCapacity) break;
      const inService = live.filter((m) => m.status === "in_service");
      const victim = live.find((m) => m.status !== "in_service") ?? (inService.length > minSize ? inService[0] : null);
      if (!victim) break;
      await this.terminateMember(victim, "scaled in to desired capacity");
      report.terminated.push(victim.instanceId);
      if (halted()) return report;
    }
    return report;
  }

  /**
   * Forceful teardown of every member. Provider failures are collected as
   * orphans; they never stop the teardown.
   */
  async delete(): Promise<TeardownReport> {
    this.deleting = true;
    this.repo.updateFleet(this.fleetId, { status: "deleting" });

    let cancelledRefreshId: string | null = null;
    if (this.active) {
      const { runId, abort, done } = this.active;
      cancelledRefreshId = runId;
      this.repo.updateRefreshRun(runId, { status: "cancelled", statusReason: "fleet deleted" });
      abort.abort();
      await done;
    }
    if (this.reconcilePass) {
      // Whatever the pass launched is in the store once it settles.
      await this.reconcilePass.catch((err: unknown) => {
        logger.warn(`Reconcile pass of fleet ${this.fleetId} failed during deletion`, { error: errorMessage(err) });
      });
    }

    const report: TeardownReport = { fleetId: this.fleetId, cancelledRefreshId, terminated: [], orphans: [] };
    const members = this.repo.listMembers(this.fleetId, [...LIVE_STATUSES, "terminating"]);
    for (const member of members) {
      if (member.status !== "terminating") {
        this.repo.transitionMember(member.id, "terminating", { lastError: "fleet deleted" });
      }
    }
    for (const member of members) {
      try {
        await this.driver.terminate(member.instanceId);
        this.repo.transitionMember(member.id, "terminated");
        report.terminated.push(member.instanceId);
      } catch (err) {
        const error = errorMessage(err);
        logger.error(`Orphaned instance ${member.instanceId} of fleet ${this.fleetId}`, { error });
        report.orphans.push({ instanceId: member.instanceId, error });
      }
    }
    logger.info(`Fleet ${this.fleetId} members torn down`, {
      terminated: report.terminated.length,
      orphans: report.orphans.length,
    });
    return report;
  }

  describe(): FleetState {
    const fleet = this.requireFleet();
    const members: Record<MemberStatus, number> = {
      launching: 0,
      in_service: 0,
      unhealthy: 0,
      terminating: 0,
      terminated: 0,
    };
    for (const m of this.repo.listMembers(this.fleetId)) members[m.status]++;
    const run = this.repo.getActiveRefreshRun(this.fleetId);
    return {
      fleetId: fleet.id,
      status: fleet.status,
      healthMode: fleet.healthMode,
      capacity: fleet.capacity,
      activeGeneration: this.repo.getActiveTemplate(this.fleetId)?.generation ?? null,
      members,
      activeRefresh: run
        ? {
            id: run.id,
            targetGeneration: run.targetGeneration,
            totalToReplace: run.totalToReplace,
            replaced: run.replaced,
            startedAt: run.startedAt,
          }
        : null,
      address: fleet.address,
    };
  }

  /** Launch one member from the active generation into the least-used subnet. */
  async launchMember(): Promise<FleetMember> {
    const fleet = this.requireFleet();
    const template = this.requireActiveTemplate();
    const subnetId = this.pickSubnet(fleet.subnetIds);
    const desc = await this.driver.launch({
      name: `${this.fleetId}-g${template.generation}-${randomUUID().slice(0, 8)}`,
      fleetTag: fleetTag(this.fleetId),
      instanceType: template.instanceType,
      amiReference: template.amiReference,
      subnetId,
      userData: template.userData,
    });
    return this.repo.insertMember({
      fleetId: this.fleetId,
      instanceId: desc.instanceId,
      generation: template.generation,
      subnetId,
      address: desc.address,
    });
  }

  /** Poll until the member passes its check (promoted to in_service), is gone, or times out. */
  async awaitHealthy(member: FleetMember, signal: AbortSignal): Promise<boolean> {
    const attempts = Math.max(1, Math.ceil(this.healthTimeoutMs / this.healthPollMs));
    for (let i = 0; i < attempts; i++) {
      if (signal.aborted) return false;
      const desc = await this.driver.describe(member.instanceId);
      if (desc.state === "gone") return false;
      if (desc.address && desc.address !== member.address) {
        this.repo.setMemberAddress(member.id, desc.address);
      }
      if (await this.probe.isHealthy({ instanceId: member.instanceId, address: desc.address ?? member.address })) {
        const latest = this.repo.getMember(member.id);
        if (latest?.status === "launching" || latest?.status === "unhealthy") {
          this.repo.transitionMember(member.id, "in_service");
        }
        return this.repo.getMember(member.id)?.status === "in_service";
      }
      await this.sleep(this.healthPollMs, signal);
    }
    return false;
  }

  /** Move a live member through terminating to terminated. */
  async terminateMember(member: FleetMember, reason: string): Promise<void> {
    if (member.status !== "terminating") {
      this.repo.transitionMember(member.id, "terminating", { lastError: reason });
    }
    await this.driver.terminate(member.instanceId);
    this.repo.transitionMember(member.id, "terminated");
    logger.info(`Member ${member.instanceId} of fleet ${this.fleetId} terminated`, { reason });
  }

  private launchExpired(member: FleetMember): boolean {
    return Date.now() - member.launchedAt * 1000 > this.healthTimeoutMs;
  }

  private assertNotDeleting(): void {
    const fleet = this.requireFleet();
    if (this.deleting || fleet.status === "deleting") {
      throw new RefreshRejectedError(this.fleetId, "fleet is being deleted");
    }
  }

  private pickSubnet(subnetIds: readonly string[]): string {
    const counts = new Map(subnetIds.map((id) => [id, 0]));
    for (const m of this.repo.listMembers(this.fleetId, LIVE_STATUSES)) {
      const n = counts.get(m.subnetId);
      if (n !== undefined) counts.set(m.subnetId, n + 1);
    }
    let best = subnetIds[0];
    for (const id of subnetIds) {
      if ((counts.get(id) ?? 0) < (counts.get(best) ?? 0)) best = id;
    }
    return best;
  }

  private requireFleet(): FleetRecord {
    const fleet = this.repo.getFleet(this.fleetId);
    if (!fleet) throw new FleetNotFoundError(this.fleetId);
    return fleet;
  }

  private requireActiveTemplate(): LaunchTemplate {
    const template = this.repo.getActiveTemplate(this.fleetId);
    if (!template) throw new Error(`Fleet ${this.fleetId} has no active launch template`);
    return template;
  }
}
