import { logger } from "../config/logger.js";
import { FleetNotFoundError, TransientDispatchFailure } from "./errors.js";
import { RefreshApiError, type RefreshTriggerApi } from "./refresh-api.js";
import type { RefreshSchedule } from "./types.js";

export const DAY_MS = 86_400_000;

/** Largest delay setTimeout honours; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type DispatchErrorCode =
  | "missing_fleet_id"
  | "fleet_not_found"
  | "permission_denied"
  | "rejected"
  | "transient"
  | "busy";

export type DispatchOutcome =
  | { status: "started"; fleetId: string; refreshId: string; alreadyInProgress: boolean }
  | {
      status: "error";
      fleetId: string;
      code: DispatchErrorCode;
      message: string;
      /** Set for transient failures so the outcome hook can report it */
      failure?: TransientDispatchFailure;
    };

export type DispatcherState = "idle" | "invoking";

function isPermissionError(err: unknown): boolean {
  return err instanceof RefreshApiError && (err.status === 401 || err.status === 403);
}

/**
 * One trigger invocation: describe the fleet, then ask for a refresh.
 * Never throws; every failure becomes an error outcome.
 */
export async function dispatchRefresh(api: RefreshTriggerApi, fleetId: string): Promise<DispatchOutcome> {
  if (!fleetId) {
    return { status: "error", fleetId, code: "missing_fleet_id", message: "No target fleet configured" };
  }
  try {
    const state = await api.describe(fleetId);
    if (!state) {
      return { status: "error", fleetId, code: "fleet_not_found", message: `Fleet not found: ${fleetId}` };
    }
    const result = await api.startRefresh(fleetId);
    if (result.outcome === "rejected") {
      return { status: "error", fleetId, code: "rejected", message: result.reason };
    }
    return {
      status: "started",
      fleetId,
      refreshId: result.refreshId,
      alreadyInProgress: result.alreadyInProgress,
    };
  } catch (err) {
    if (err instanceof FleetNotFoundError) {
      return { status: "error", fleetId, code: "fleet_not_found", message: err.message };
    }
    if (isPermissionError(err)) {
      return {
        status: "error",
        fleetId,
        code: "permission_denied",
        message: err instanceof Error ? err.message : String(err),
      };
    }
    const failure = new TransientDispatchFailure(fleetId, { cause: err });
    return { status: "error", fleetId, code: "transient", message: failure.message, failure };
  }
}

export interface RefreshDispatcherOptions {
  /** Called with every tick's outcome, after it was logged. */
  onOutcome?: (outcome: DispatchOutcome) => void;
}

/**
 * Fires a refresh trigger for one fleet every `intervalDays`. Holds nothing
 * but the fleet identifier: a failed tick is not retried, the next tick is.
 */
export class RefreshDispatcher {
  private readonly api: RefreshTriggerApi;
  private readonly fleetId: string;
  private readonly intervalMs: number;
  private readonly onOutcome: (outcome: DispatchOutcome) => void;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextTickAt = 0;
  private currentState: DispatcherState = "idle";

  constructor(
    api: RefreshTriggerApi,
    schedule: Pick<RefreshSchedule, "intervalDays" | "targetFleetId">,
    options: RefreshDispatcherOptions = {},
  ) {
    if (!(schedule.intervalDays > 0)) {
      throw new Error(`Refresh interval must be positive, got ${schedule.intervalDays} days`);
    }
    this.api = api;
    this.fleetId = schedule.targetFleetId;
    this.intervalMs = schedule.intervalDays * DAY_MS;
    this.onOutcome = options.onOutcome ?? (() => {});
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      logger.warn("Refresh dispatcher already running");
      return;
    }
    this.nextTickAt = Date.now() + this.intervalMs;
    logger.info("Starting refresh dispatcher", {
      fleetId: this.fleetId,
      intervalMs: this.intervalMs,
      nextTickAt: new Date(this.nextTickAt).toISOString(),
    });
    this.arm();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      logger.info("Refresh dispatcher stopped", { fleetId: this.fleetId });
    }
  }

  /** Run one trigger now. A tick that lands while another is invoking is dropped. */
  async tick(): Promise<DispatchOutcome> {
    if (this.currentState === "invoking") {
      const busy: DispatchOutcome = {
        status: "error",
        fleetId: this.fleetId,
        code: "busy",
        message: "Previous trigger still in flight",
      };
      this.report(busy);
      return busy;
    }

    this.currentState = "invoking";
    let outcome: DispatchOutcome;
    try {
      outcome = await dispatchRefresh(this.api, this.fleetId);
    } finally {
      this.currentState = "idle";
    }
    this.report(outcome);
    return outcome;
  }

  private arm(): void {
    const delay = Math.min(Math.max(0, this.nextTickAt - Date.now()), MAX_TIMER_DELAY_MS);
    this.timer = setTimeout(() => this.onTimer(), delay);
  }

  private onTimer(): void {
    if (Date.now() >= this.nextTickAt) {
      this.nextTickAt += this.intervalMs;
      void this.tick();
    }
    this.arm();
  }

  private report(outcome: DispatchOutcome): void {
    if (outcome.status === "started") {
      logger.info(`Refresh triggered for fleet ${outcome.fleetId}`, {
        refreshId: outcome.refreshId,
        alreadyInProgress: outcome.alreadyInProgress,
      });
    } else if (outcome.code === "busy") {
      logger.warn(`Refresh tick for fleet ${outcome.fleetId} skipped`, { reason: outcome.message });
    } else {
      logger.error(`Refresh trigger for fleet ${outcome.fleetId} failed`, {
        code: outcome.code,
        message: outcome.message,
      });
    }
    try {
      this.onOutcome(outcome);
    } catch (err) {
      logger.error("Refresh dispatcher outcome hook threw", { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
