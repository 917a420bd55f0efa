import { logger } from "../config/logger.js";
import type { FleetMember, IFleetRepository, RefreshRun } from "./fleet-repository.js";
import { LIVE_STATUSES } from "./member-state-machine.js";
import type { VersionedCapacity } from "./types.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Member operations the refresh borrows from its controller. */
export interface RefreshMemberOps {
  /** Launch one member from the fleet's active template generation. */
  launchMember(): Promise<FleetMember>;
  /** Resolves true once the member passed its health check and is in service. */
  awaitHealthy(member: FleetMember, signal: AbortSignal): Promise<boolean>;
  terminateMember(member: FleetMember, reason: string): Promise<void>;
}

export interface RollingRefreshOptions {
  repo: IFleetRepository;
  fleetId: string;
  ops: RefreshMemberOps;
  sleep: Sleep;
  minHealthyPercentage: number;
  instanceWarmupSeconds: number;
  /** Pause between floor re-checks when no top-up member can be launched */
  floorRecheckMs?: number;
  /** Re-checks before the run gives up on reaching the floor */
  floorRecheckAttempts?: number;
}

/** In-service members a refresh must keep: `max(minSize, ceil(desired × pct / 100))`, capped at maxSize. */
export function healthyFloor(capacity: VersionedCapacity, minHealthyPercentage: number): number {
  const byPercentage = Math.ceil((capacity.desiredCapacity * minHealthyPercentage) / 100);
  return Math.min(capacity.maxSize, Math.max(capacity.minSize, byPercentage));
}

class RefreshCancelled extends Error {
  constructor() {
    super("Refresh cancelled");
    this.name = "RefreshCancelled";
  }
}

class RefreshStepFailed extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RefreshStepFailed";
  }
}

/**
 * Replaces every member present at the start of a run, one at a time,
 * launching before terminating. Capacity is re-read from the store at each
 * step so operator edits made mid-run are honoured. A template change made
 * while the run is going extends it: members still on an older generation
 * are replaced before the run finishes.
 */
export class RollingRefresh {
  private readonly repo: IFleetRepository;
  private readonly fleetId: string;
  private readonly ops: RefreshMemberOps;
  private readonly sleep: Sleep;
  private readonly minHealthyPercentage: number;
  private readonly warmupMs: number;
  private readonly floorRecheckMs: number;
  private readonly floorRecheckAttempts: number;

  constructor(options: RollingRefreshOptions) {
    this.repo = options.repo;
    this.fleetId = options.fleetId;
    this.ops = options.ops;
    this.sleep = options.sleep;
    this.minHealthyPercentage = options.minHealthyPercentage;
    this.warmupMs = options.instanceWarmupSeconds * 1000;
    this.floorRecheckMs = options.floorRecheckMs ?? 15_000;
    this.floorRecheckAttempts = options.floorRecheckAttempts ?? 40;
  }

  /** Drive the run to a terminal status. Never rejects. */
  async run(run: RefreshRun, targets: readonly FleetMember[], signal: AbortSignal): Promise<RefreshRun> {
    let replaced = 0;
    let total = targets.length;
    let pending = targets;
    try {
      while (pending.length > 0) {
        for (const old of pending) {
          this.throwIfCancelled(signal);
          await this.replace(old, signal);
          replaced++;
          this.repo.updateRefreshRun(run.id, { replaced });
          logger.info(`Refresh ${run.id} replaced ${replaced}/${total}`, { fleetId: this.fleetId });
        }
        this.throwIfCancelled(signal);
        pending = this.outdatedMembers(run.id, total);
        total += pending.length;
      }
      return this.finish(run.id, "succeeded", null);
    } catch (err) {
      if (signal.aborted || err instanceof RefreshCancelled) {
        logger.warn(`Refresh ${run.id} cancelled`, { fleetId: this.fleetId, replaced });
        return this.finish(run.id, "cancelled", "cancelled");
      }
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`Refresh ${run.id} failed`, { fleetId: this.fleetId, replaced, error: reason });
      return this.finish(run.id, "failed", reason);
    }
  }

  /** Live members launched from a generation older than the active one; retargets the run when there are any. */
  private outdatedMembers(runId: string, total: number): FleetMember[] {
    const template = this.repo.getActiveTemplate(this.fleetId);
    if (!template) return [];
    const outdated = this.repo
      .listMembers(this.fleetId, LIVE_STATUSES)
      .filter((m) => m.generation < template.generation);
    if (outdated.length > 0) {
      this.repo.updateRefreshRun(runId, {
        targetGeneration: template.generation,
        totalToReplace: total + outdated.length,
      });
      logger.info(`Refresh ${runId} extended to generation ${template.generation}`, {
        fleetId: this.fleetId,
        outdated: outdated.length,
      });
    }
    return outdated;
  }

  private async replace(old: FleetMember, signal: AbortSignal): Promise<void> {
    const current = this.repo.getMember(old.id);
    if (!current || !LIVE_STATUSES.includes(current.status)) {
      return;
    }

    await this.launchHealthy(signal);

    for (let attempt = 0; ; attempt++) {
      this.throwIfCancelled(signal);
      const capacity = this.repo.readCapacity(this.fleetId);
      const floor = healthyFloor(capacity, this.minHealthyPercentage);
      const members = this.repo.listMembers(this.fleetId, LIVE_STATUSES);
      const inServiceWithoutOld = members.filter((m) => m.id !== old.id && m.status === "in_service").length;

      if (inServiceWithoutOld >= floor) {
        const latest = this.repo.getMember(old.id);
        if (latest && LIVE_STATUSES.includes(latest.status)) {
          await this.ops.terminateMember(latest, "replaced by rolling refresh");
        }
        return;
      }

      if (members.length < capacity.maxSize + 1) {
        logger.info("Launching top-up member to hold the healthy floor", {
          fleetId: this.fleetId,
          floor,
          inService: inServiceWithoutOld,
        });
        await this.launchHealthy(signal);
        continue;
      }

      if (attempt >= this.floorRecheckAttempts) {
        throw new RefreshStepFailed(
          `Could not hold ${floor} in-service members while replacing ${old.instanceId}`,
        );
      }
      await this.sleep(this.floorRecheckMs, signal);
    }
  }

  private async launchHealthy(signal: AbortSignal): Promise<FleetMember> {
    const member = await this.ops.launchMember();
    this.throwIfCancelled(signal);
    await this.sleep(this.warmupMs, signal);
    const healthy = await this.ops.awaitHealthy(member, signal);
    if (!healthy) {
      this.throwIfCancelled(signal);
      const latest = this.repo.getMember(member.id) ?? member;
      if (LIVE_STATUSES.includes(latest.status)) {
        await this.ops.terminateMember(latest, "replacement failed its health check");
      }
      throw new RefreshStepFailed(`Replacement ${member.instanceId} never became healthy`);
    }
    return member;
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) throw new RefreshCancelled();
  }

  /** A run someone else already closed (a delete cancelling it) keeps that status. */
  private finish(runId: string, status: "succeeded" | "failed" | "cancelled", reason: string | null): RefreshRun {
    const current = this.repo.getRefreshRun(runId);
    if (current && current.status !== "in_progress") return current;
    return this.repo.updateRefreshRun(runId, { status, statusReason: reason });
  }
}
