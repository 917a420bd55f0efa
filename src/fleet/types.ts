import { z } from "zod";

/** Lowercase DNS label: fleet names become resource names and tags. */
const FLEET_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/** Desired shape of the compute group. The capacity range is checked separately. */
export const fleetSpecSchema = z.object({
  name: z.string().regex(FLEET_NAME_PATTERN, "must be a lowercase DNS label"),
  instanceType: z.string().min(1),
  desiredCapacity: z.number().int().nonnegative(),
  minSize: z.number().int().nonnegative(),
  maxSize: z.number().int().positive(),
  subnetIds: z
    .array(z.string().min(1))
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, "subnetIds must not repeat"),
  amiReference: z.string().min(1),
});
export type FleetSpec = z.infer<typeof fleetSpecSchema>;

/** Traffic tier toggle as written by the operator. */
export const trafficTierSpecSchema = z.object({
  enabled: z.boolean().default(false),
  certificateRef: z.string().optional(),
  /** Defaults to the fleet's subnets */
  subnetIds: z.array(z.string().min(1)).optional(),
  /** Discovery address to report when the tier is disabled */
  fallbackAddress: z.string().min(1).optional(),
});
export type TrafficTierSpec = z.infer<typeof trafficTierSpecSchema>;

export const refreshScheduleSchema = z.object({
  intervalDays: z.number().int().positive().default(30),
  minHealthyPercentage: z.number().int().min(0).max(100).default(90),
  instanceWarmupSeconds: z.number().int().nonnegative().default(300),
});
export type RefreshScheduleSpec = z.infer<typeof refreshScheduleSchema>;

export const fleetDefinitionSchema = z.object({
  fleet: fleetSpecSchema,
  trafficTier: trafficTierSpecSchema.default({ enabled: false }),
  schedule: refreshScheduleSchema.default({}),
  security: z
    .object({
      fallbackIngressCidr: z.string().min(1).optional(),
    })
    .default({}),
  /** Optional monitoring config template; defaults to templates/monitoring-config.json */
  monitoringTemplate: z.string().optional(),
});
export type FleetDefinitionInput = z.input<typeof fleetDefinitionSchema>;

/**
 * The public tier after validation. The boolean toggle stops here: everything
 * downstream switches on `kind`.
 */
export type TrafficTier =
  | { kind: "absent"; fallbackAddress: string | null }
  | { kind: "present"; certificateRef: string; subnetIds: readonly string[] };

export interface RefreshSchedule {
  intervalDays: number;
  /** Fleet name; the schedule only ever looks fleets up by this identifier */
  targetFleetId: string;
  minHealthyPercentage: number;
  instanceWarmupSeconds: number;
}

/** A fully validated fleet definition, safe to hand to the provisioner. */
export interface FleetDefinition {
  fleet: FleetSpec;
  trafficTier: TrafficTier;
  schedule: RefreshSchedule;
  fallbackIngressCidr: string;
  monitoringTemplate: string | null;
}

export type HealthMode = "endpoint-health" | "self-reported";

/** The externally adjustable part of a fleet, versioned for compare-and-swap. */
export interface VersionedCapacity {
  desiredCapacity: number;
  minSize: number;
  maxSize: number;
  version: number;
}

export type CapacityPatch = Partial<Omit<VersionedCapacity, "version">>;

export const capacityPatchSchema = z
  .object({
    desiredCapacity: z.number().int().nonnegative().optional(),
    minSize: z.number().int().nonnegative().optional(),
    maxSize: z.number().int().positive().optional(),
    expectedVersion: z.number().int().positive().optional(),
  })
  .strict();

export const templateChangeSchema = z
  .object({
    instanceType: z.string().min(1).optional(),
    amiReference: z.string().min(1).optional(),
  })
  .strict();
export type TemplateChange = z.infer<typeof templateChangeSchema>;
