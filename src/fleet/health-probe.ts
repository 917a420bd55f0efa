import { logger } from "../config/logger.js";
import type { InstanceDriver } from "./instance-driver.js";
import { MEMBER_HTTP_PORT } from "./security-boundary.js";
import type { HealthMode, TrafficTier } from "./types.js";

export interface ProbeTarget {
  instanceId: string;
  address: string | null;
}

export interface HealthProbe {
  readonly mode: HealthMode;
  isHealthy(target: ProbeTarget): Promise<boolean>;
}

/** Derived from the tier, never configured on its own. */
export function healthModeFor(tier: TrafficTier): HealthMode {
  return tier.kind === "present" ? "endpoint-health" : "self-reported";
}

/** Healthy while the provider reports the instance running. */
export class SelfReportedProbe implements HealthProbe {
  readonly mode = "self-reported" as const;

  constructor(private readonly driver: InstanceDriver) {}

  async isHealthy(target: ProbeTarget): Promise<boolean> {
    const desc = await this.driver.describe(target.instanceId);
    return desc.state === "running";
  }
}

/** Healthy when `GET /` on port 80 answers 2xx, the same check the balancer runs. */
export class EndpointHealthProbe implements HealthProbe {
  readonly mode = "endpoint-health" as const;
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async isHealthy(target: ProbeTarget): Promise<boolean> {
    if (!target.address) return false;
    try {
      const res = await fetch(`http://${target.address}:${MEMBER_HTTP_PORT}/`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return res.ok;
    } catch (err) {
      logger.debug(`Health probe of ${target.instanceId} failed`, {
        address: target.address,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }
}

export function createHealthProbe(mode: HealthMode, driver: InstanceDriver): HealthProbe {
  return mode === "endpoint-health" ? new EndpointHealthProbe() : new SelfReportedProbe(driver);
}
