import { logger } from "../config/logger.js";
import type { CreateLoadBalancerParams, DOClient, DOHealthCheck, DOLoadBalancer } from "./do-client.js";
import { isNotFound } from "./do-client.js";
import { InvalidConfigurationError } from "./errors.js";
import { MEMBER_HTTP_PORT, TIER_HTTPS_PORT } from "./security-boundary.js";
import type { TrafficTier } from "./types.js";

/** What the tier will look like before anything is created. */
export interface TrafficTierPlan {
  name: string;
  /** Members join the target pool by this tag */
  fleetTag: string;
  listener: { protocol: "https"; port: typeof TIER_HTTPS_PORT; certificateRef: string };
  targetPool: { protocol: "http"; port: typeof MEMBER_HTTP_PORT };
  healthCheck: { protocol: "http"; port: typeof MEMBER_HTTP_PORT; path: "/" };
  subnetIds: readonly string[];
}

export class TrafficTierProvisioningError extends Error {
  constructor(
    message: string,
    public readonly balancerId?: string,
  ) {
    super(message);
    this.name = "TrafficTierProvisioningError";
  }
}

export function fleetTag(fleetName: string): string {
  return `fleet-${fleetName}`;
}

/** `null` when the tier is absent. */
export function planTrafficTier(fleetName: string, tier: TrafficTier): TrafficTierPlan | null {
  if (tier.kind === "absent") return null;
  if (!tier.certificateRef.trim()) {
    throw new InvalidConfigurationError("trafficTier.certificateRef is required when the traffic tier is enabled");
  }
  return {
    name: `${fleetName}-tier`,
    fleetTag: fleetTag(fleetName),
    listener: { protocol: "https", port: TIER_HTTPS_PORT, certificateRef: tier.certificateRef },
    targetPool: { protocol: "http", port: MEMBER_HTTP_PORT },
    healthCheck: { protocol: "http", port: MEMBER_HTTP_PORT, path: "/" },
    subnetIds: tier.subnetIds,
  };
}

/**
 * The address clients should use: the balancer's for a present tier, the
 * operator-supplied fallback otherwise.
 */
export function resolveEffectiveAddress(tier: TrafficTier, balancer: { ip: string } | null): string | null {
  if (tier.kind === "present") {
    return balancer?.ip || null;
  }
  return tier.fallbackAddress;
}

/** Members failing this check stop receiving traffic; the controller removes them. */
const HEALTH_CHECK_TIMING: Omit<DOHealthCheck, "protocol" | "port" | "path"> = {
  check_interval_seconds: 10,
  response_timeout_seconds: 5,
  healthy_threshold: 3,
  unhealthy_threshold: 3,
};

/** The slice of the provider client the tier needs. */
export type LoadBalancerApi = Pick<DOClient, "createLoadBalancer" | "getLoadBalancer" | "deleteLoadBalancer">;

export class TrafficTierProvisioner {
  private readonly doClient: LoadBalancerApi;
  private readonly region: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;

  constructor(doClient: LoadBalancerApi, options: { region: string; pollIntervalMs?: number; timeoutMs?: number }) {
    this.doClient = doClient;
    this.region = options.region;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.timeoutMs = options.timeoutMs ?? 600_000;
  }

  /**
   * Create the balancer for a plan and wait until it is active.
   * A balancer that never activates is deleted before the error propagates.
   */
  async provision(plan: TrafficTierPlan): Promise<DOLoadBalancer> {
    const params: CreateLoadBalancerParams = {
      name: plan.name,
      region: this.region,
      vpc_uuid: plan.subnetIds[0],
      tag: plan.fleetTag,
      forwarding_rules: [
        {
          entry_protocol: plan.listener.protocol,
          entry_port: plan.listener.port,
          target_protocol: plan.targetPool.protocol,
          target_port: plan.targetPool.port,
          certificate_id: plan.listener.certificateRef,
        },
      ],
      health_check: { ...plan.healthCheck, ...HEALTH_CHECK_TIMING },
    };

    const created = await this.doClient.createLoadBalancer(params);
    logger.info(`Traffic tier ${plan.name} created`, { balancerId: created.id });

    try {
      return await this.waitForActive(created.id);
    } catch (err) {
      await this.destroy(created.id);
      throw err;
    }
  }

  /** Delete the balancer; an already-deleted one counts as done. */
  async destroy(balancerId: string): Promise<void> {
    try {
      await this.doClient.deleteLoadBalancer(balancerId);
      logger.info(`Traffic tier balancer ${balancerId} deleted`);
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  private async waitForActive(balancerId: string): Promise<DOLoadBalancer> {
    const start = Date.now();
    while (Date.now() - start < this.timeoutMs) {
      const lb = await this.doClient.getLoadBalancer(balancerId);
      if (lb.status === "active") return lb;
      if (lb.status === "errored") {
        throw new TrafficTierProvisioningError(`Load balancer ${balancerId} errored during creation`, balancerId);
      }
      await new Promise((r) => setTimeout(r, this.pollIntervalMs));
    }
    throw new TrafficTierProvisioningError(
      `Load balancer ${balancerId} did not become active within ${this.timeoutMs}ms`,
      balancerId,
    );
  }
}
