import { logger } from "../config/logger.js";
import { buildBootstrapPayload, generateCloudInit, renderMonitoringConfig } from "./bootstrap-payload.js";
import { CapacityGroupController, type TeardownReport } from "./capacity-group.js";
import type { DOClient } from "./do-client.js";
import { isNotFound } from "./do-client.js";
import { FleetNotFoundError, InvalidConfigurationError } from "./errors.js";
import type { ControllerDepsFactory, FleetRegistry } from "./fleet-registry.js";
import type { FleetRecord, IFleetRepository } from "./fleet-repository.js";
import { healthModeFor } from "./health-probe.js";
import { buildFirewallRequest, resolveSecurityPolicy } from "./security-boundary.js";
import { fleetTag, planTrafficTier, resolveEffectiveAddress, type TrafficTierProvisioner } from "./traffic-tier.js";
import type { FleetDefinition } from "./types.js";

export type FirewallApi = Pick<DOClient, "createFirewall" | "deleteFirewall">;
export type TierApi = Pick<TrafficTierProvisioner, "provision" | "destroy">;

export interface FleetProvisionerDeps {
  repo: IFleetRepository;
  registry: FleetRegistry;
  depsFor: ControllerDepsFactory;
  tiers: TierApi;
  firewalls: FirewallApi;
}

export interface EnsureResult {
  controller: CapacityGroupController;
  created: boolean;
}

export interface FleetTeardownReport extends TeardownReport {
  balancerDeleted: boolean;
  firewallDeleted: boolean;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Differences between a stored fleet's ingress and what its definition now asks for. */
export function ingressDrift(stored: FleetRecord, definition: FleetDefinition): string[] {
  const drift: string[] = [];
  const tier = definition.trafficTier.kind;
  if (stored.trafficTier !== tier) {
    drift.push(`trafficTier: provisioned ${stored.trafficTier}, definition wants ${tier}`);
  }
  const healthMode = healthModeFor(definition.trafficTier);
  if (stored.healthMode !== healthMode) {
    drift.push(`healthMode: provisioned ${stored.healthMode}, definition wants ${healthMode}`);
  }
  // Fleets stored before the range was recorded have none to compare.
  if (tier === "absent" && stored.ingressCidr !== null && stored.ingressCidr !== definition.fallbackIngressCidr) {
    drift.push(
      `fallbackIngressCidr: provisioned ${stored.ingressCidr}, definition wants ${definition.fallbackIngressCidr}`,
    );
  }
  return drift;
}

/**
 * Composes a fleet from its definition: bootstrap payload, traffic tier,
 * firewall, then the capacity group. Teardown runs the same steps backwards.
 */
export class FleetProvisioner {
  private readonly repo: IFleetRepository;
  private readonly registry: FleetRegistry;
  private readonly depsFor: ControllerDepsFactory;
  private readonly tiers: TierApi;
  private readonly firewalls: FirewallApi;

  constructor(deps: FleetProvisionerDeps) {
    this.repo = deps.repo;
    this.registry = deps.registry;
    this.depsFor = deps.depsFor;
    this.tiers = deps.tiers;
    this.firewalls = deps.firewalls;
  }

  /**
   * Provision a new fleet. Every configuration check runs before the first
   * provider call; cloud resources created before a later failure are
   * removed before the error propagates.
   */
  async provision(definition: FleetDefinition): Promise<CapacityGroupController> {
    const name = definition.fleet.name;
    if (this.repo.getFleet(name)) {
      throw new InvalidConfigurationError(`Fleet ${name} already exists`);
    }

    const plan = planTrafficTier(name, definition.trafficTier);
    const payload = buildBootstrapPayload(renderMonitoringConfig(name, definition.monitoringTemplate ?? undefined));
    const userData = generateCloudInit(payload);
    const healthMode = healthModeFor(definition.trafficTier);

    let balancerId: string | null = null;
    let firewallId: string | null = null;
    try {
      const balancer = plan ? await this.tiers.provision(plan) : null;
      balancerId = balancer?.id ?? null;

      const policy = resolveSecurityPolicy(definition.trafficTier, definition.fallbackIngressCidr, balancerId);
      if (policy.sourceKind === "static_cidr_block" && policy.isDefaultFallback) {
        logger.warn(`Fleet ${name} accepts port ${policy.port} from the default range ${policy.cidr}`, {
          hint: "set FLEET_FALLBACK_INGRESS_CIDR or security.fallbackIngressCidr to narrow it",
        });
      }
      const firewall = await this.firewalls.createFirewall(buildFirewallRequest(policy, fleetTag(name)));
      firewallId = firewall.id;

      const controller = await CapacityGroupController.create(
        { ...this.depsFor({ id: name, healthMode }), schedule: definition.schedule },
        {
          id: name,
          instanceType: definition.fleet.instanceType,
          amiReference: definition.fleet.amiReference,
          subnetIds: definition.fleet.subnetIds,
          desiredCapacity: definition.fleet.desiredCapacity,
          minSize: definition.fleet.minSize,
          maxSize: definition.fleet.maxSize,
          healthMode,
          trafficTier: definition.trafficTier.kind,
        },
        {
          instanceType: definition.fleet.instanceType,
          amiReference: definition.fleet.amiReference,
          userData,
          payloadDigest: payload.digest,
        },
      );
      this.repo.updateFleet(name, {
        balancerId,
        firewallId,
        ingressCidr: policy.sourceKind === "static_cidr_block" ? policy.cidr : null,
        address: resolveEffectiveAddress(definition.trafficTier, balancer),
      });
      this.registry.register(controller);

      logger.info(`Fleet ${name} provisioned`, {
        trafficTier: definition.trafficTier.kind,
        healthMode,
        desiredCapacity: definition.fleet.desiredCapacity,
        payloadDigest: payload.digest,
      });
      return controller;
    } catch (err) {
      logger.error(`Provisioning fleet ${name} failed, rolling back`, { error: errorMessage(err) });
      await this.rollback(name, balancerId, firewallId);
      throw err;
    }
  }

  /**
   * Provision the fleet if the store has never seen it, otherwise load it.
   * A stored fleet whose ingress no longer matches the definition is refused;
   * changing the traffic tier or the fallback range means tearing the fleet
   * down and provisioning it again.
   */
  async ensureFleet(definition: FleetDefinition): Promise<EnsureResult> {
    const name = definition.fleet.name;
    const existing = this.registry.get(name);
    const stored = this.repo.getFleet(name);
    if (existing && stored) {
      const drift = ingressDrift(stored, definition);
      if (drift.length > 0) {
        throw new InvalidConfigurationError(`Fleet ${name} no longer matches its definition`, drift);
      }
      logger.info(`Fleet ${name} already provisioned`);
      return { controller: existing, created: false };
    }
    return { controller: await this.provision(definition), created: true };
  }

  /**
   * Terminate every member, then remove the firewall and traffic tier.
   * Resources the provider no longer has count as deleted.
   */
  async teardown(fleetId: string): Promise<FleetTeardownReport> {
    const controller = this.registry.get(fleetId);
    const fleet = this.repo.getFleet(fleetId);
    if (!controller || !fleet) throw new FleetNotFoundError(fleetId);

    const report = await controller.delete();
    const firewallDeleted = fleet.firewallId ? await this.deleteFirewall(fleet.firewallId) : true;
    let balancerDeleted = true;
    if (fleet.balancerId) {
      try {
        await this.tiers.destroy(fleet.balancerId);
      } catch (err) {
        balancerDeleted = false;
        logger.error(`Could not delete traffic tier of fleet ${fleetId}`, {
          balancerId: fleet.balancerId,
          error: errorMessage(err),
        });
      }
    }

    this.repo.deleteFleet(fleetId);
    this.registry.remove(fleetId);
    logger.info(`Fleet ${fleetId} deleted`, { orphans: report.orphans.length, firewallDeleted, balancerDeleted });
    return { ...report, balancerDeleted, firewallDeleted };
  }

  private async deleteFirewall(firewallId: string): Promise<boolean> {
    try {
      await this.firewalls.deleteFirewall(firewallId);
      return true;
    } catch (err) {
      if (isNotFound(err)) return true;
      logger.error(`Could not delete firewall ${firewallId}`, { error: errorMessage(err) });
      return false;
    }
  }

  private async rollback(fleetId: string, balancerId: string | null, firewallId: string | null): Promise<void> {
    const stored = this.repo.getFleet(fleetId);
    if (stored) {
      const { orphans } = await CapacityGroupController.load(this.depsFor(stored), fleetId).delete();
      if (orphans.length > 0) {
        logger.error(`Rollback of fleet ${fleetId} left orphaned instances`, { orphans });
      }
      this.repo.deleteFleet(fleetId);
    }
    if (firewallId) await this.deleteFirewall(firewallId);
    if (balancerId) {
      try {
        await this.tiers.destroy(balancerId);
      } catch (err) {
        logger.error(`Rollback could not delete traffic tier ${balancerId}`, { error: errorMessage(err) });
      }
    }
  }
}
