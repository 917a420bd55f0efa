import { logger } from "../config/logger.js";
import type { ReconcileReport } from "./capacity-group.js";

/** The slice of a fleet controller the watchdog drives. */
export interface ReconcileTarget {
  readonly fleetId: string;
  reconcile(): Promise<ReconcileReport>;
}

export interface FleetSource {
  list(): ReconcileTarget[];
}

export interface FleetWatchdogConfig {
  /** Check interval in milliseconds */
  checkIntervalMs?: number;
}

/**
 * Periodically reconciles every active fleet: re-probes member health,
 * replaces unhealthy members and converges on desired capacity.
 */
export class FleetWatchdog {
  private readonly registry: FleetSource;
  private readonly CHECK_INTERVAL_MS: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private checking = false;

  constructor(registry: FleetSource, config: FleetWatchdogConfig = {}) {
    this.registry = registry;
    this.CHECK_INTERVAL_MS = config.checkIntervalMs ?? 60_000;
  }

  start(): void {
    if (this.timer) {
      logger.warn("Fleet watchdog already running");
      return;
    }
    logger.info("Starting fleet watchdog", { checkIntervalMs: this.CHECK_INTERVAL_MS });
    this.timer = setInterval(() => {
      void this.check();
    }, this.CHECK_INTERVAL_MS);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Fleet watchdog stopped");
    }
  }

  /** One pass over all fleets. Overlapping passes are skipped. */
  async check(): Promise<void> {
    if (this.checking) return;
    this.checking = true;
    try {
      for (const controller of this.registry.list()) {
        try {
          const report = await controller.reconcile();
          if (report.launched.length > 0 || report.terminated.length > 0 || report.markedUnhealthy.length > 0) {
            logger.info(`Fleet ${controller.fleetId} reconciled`, {
              launched: report.launched,
              terminated: report.terminated,
              markedUnhealthy: report.markedUnhealthy,
              lost: report.lost,
            });
          }
        } catch (err) {
          logger.error(`Reconcile failed for fleet ${controller.fleetId}`, {
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    } finally {
      this.checking = false;
    }
  }
}
