import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { DEFAULT_FALLBACK_INGRESS_CIDR } from "../config/index.js";
import { InvalidCapacityRangeError, InvalidConfigurationError } from "./errors.js";
import { type FleetDefinition, fleetDefinitionSchema, type TrafficTier, type TrafficTierSpec } from "./types.js";

/** Throws unless `minSize ≤ desiredCapacity ≤ maxSize`. */
export function assertCapacityRange(capacity: { minSize: number; desiredCapacity: number; maxSize: number }): void {
  const { minSize, desiredCapacity, maxSize } = capacity;
  if (!(minSize <= desiredCapacity && desiredCapacity <= maxSize)) {
    throw new InvalidCapacityRangeError(minSize, desiredCapacity, maxSize);
  }
}

/**
 * Collapse the operator's `enabled` flag into the tier variant.
 * A certificate is required with the tier and forbidden without it.
 */
export function resolveTrafficTier(spec: TrafficTierSpec, fleetSubnetIds: readonly string[]): TrafficTier {
  const certificateRef = spec.certificateRef?.trim() ?? "";
  if (spec.enabled) {
    if (!certificateRef) {
      throw new InvalidConfigurationError("trafficTier.certificateRef is required when the traffic tier is enabled");
    }
    return {
      kind: "present",
      certificateRef,
      subnetIds: spec.subnetIds && spec.subnetIds.length > 0 ? [...spec.subnetIds] : [...fleetSubnetIds],
    };
  }
  if (spec.certificateRef !== undefined) {
    throw new InvalidConfigurationError("trafficTier.certificateRef must be absent when the traffic tier is disabled");
  }
  return { kind: "absent", fallbackAddress: spec.fallbackAddress ?? null };
}

export interface DefinitionDefaults {
  fallbackIngressCidr?: string;
}

/**
 * Validate a raw fleet definition. Every failure surfaces as
 * InvalidConfigurationError before anything is provisioned.
 */
export function parseFleetDefinition(raw: unknown, defaults: DefinitionDefaults = {}): FleetDefinition {
  const result = fleetDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new InvalidConfigurationError(`Invalid fleet definition: ${issues.join("; ")}`, issues);
  }

  const { fleet, trafficTier, schedule, security, monitoringTemplate } = result.data;
  assertCapacityRange(fleet);

  return {
    fleet,
    trafficTier: resolveTrafficTier(trafficTier, fleet.subnetIds),
    schedule: {
      intervalDays: schedule.intervalDays,
      targetFleetId: fleet.name,
      minHealthyPercentage: schedule.minHealthyPercentage,
      instanceWarmupSeconds: schedule.instanceWarmupSeconds,
    },
    fallbackIngressCidr:
      security.fallbackIngressCidr ?? defaults.fallbackIngressCidr ?? DEFAULT_FALLBACK_INGRESS_CIDR,
    monitoringTemplate: monitoringTemplate ?? null,
  };
}

/** Load and validate a YAML fleet definition from disk. */
export function loadFleetDefinition(filePath: string, defaults: DefinitionDefaults = {}): FleetDefinition {
  if (!fs.existsSync(filePath)) {
    throw new InvalidConfigurationError(`Fleet definition not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new InvalidConfigurationError(
      `Fleet definition ${filePath} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseFleetDefinition(raw, defaults);
}
