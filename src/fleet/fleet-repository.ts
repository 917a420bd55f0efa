import type { MemberStatus } from "./member-state-machine.js";
import type { CapacityPatch, HealthMode, VersionedCapacity } from "./types.js";

export type FleetStatus = "active" | "deleting";
export type LaunchTemplateStatus = "active" | "retired";
export type RefreshRunStatus = "in_progress" | "succeeded" | "failed" | "cancelled" | "abandoned";

export interface FleetRecord {
  id: string;
  status: FleetStatus;
  instanceType: string;
  amiReference: string;
  subnetIds: string[];
  capacity: VersionedCapacity;
  healthMode: HealthMode;
  trafficTier: "absent" | "present";
  balancerId: string | null;
  firewallId: string | null;
  /** Port-80 source range; null behind a traffic tier */
  ingressCidr: string | null;
  address: string | null;
  createdAt: number;
  updatedAt: number;
}

export interface NewFleet {
  id: string;
  instanceType: string;
  amiReference: string;
  subnetIds: readonly string[];
  desiredCapacity: number;
  minSize: number;
  maxSize: number;
  healthMode: HealthMode;
  trafficTier: "absent" | "present";
}

export type FleetUpdate = Partial<
  Pick<
    FleetRecord,
    "status" | "balancerId" | "firewallId" | "ingressCidr" | "address" | "instanceType" | "amiReference"
  >
>;

export interface LaunchTemplate {
  id: string;
  fleetId: string;
  generation: number;
  instanceType: string;
  amiReference: string;
  userData: string;
  payloadDigest: string;
  status: LaunchTemplateStatus;
  createdAt: number;
  retiredAt: number | null;
}

export type NewLaunchTemplate = Pick<LaunchTemplate, "instanceType" | "amiReference" | "userData" | "payloadDigest">;

export interface FleetMember {
  id: string;
  fleetId: string;
  instanceId: string;
  generation: number;
  subnetId: string;
  address: string | null;
  status: MemberStatus;
  lastError: string | null;
  launchedAt: number;
  updatedAt: number;
}

export type NewFleetMember = Pick<FleetMember, "fleetId" | "instanceId" | "generation" | "subnetId" | "address">;

export interface RefreshRun {
  id: string;
  fleetId: string;
  status: RefreshRunStatus;
  targetGeneration: number;
  totalToReplace: number;
  replaced: number;
  statusReason: string | null;
  startedAt: number;
  finishedAt: number | null;
}

export type RefreshRunUpdate = Partial<
  Pick<RefreshRun, "status" | "replaced" | "statusReason" | "totalToReplace" | "targetGeneration">
>;

/**
 * Fleet state store. Capacity edits are compare-and-swap on the version;
 * member status changes follow the member state machine.
 */
export interface IFleetRepository {
  /** Insert the fleet with generation 1 of its launch template. */
  createFleet(fleet: NewFleet, template: NewLaunchTemplate): FleetRecord;
  getFleet(id: string): FleetRecord | null;
  listFleets(): FleetRecord[];
  updateFleet(id: string, update: FleetUpdate): FleetRecord;
  /** Remove the fleet and everything it owns. */
  deleteFleet(id: string): void;

  readCapacity(fleetId: string): VersionedCapacity;
  /**
   * Merge, range-check and store a capacity edit.
   * With `expectedVersion`, fails unless the stored version matches.
   */
  updateCapacity(fleetId: string, patch: CapacityPatch, expectedVersion?: number): VersionedCapacity;

  insertTemplate(fleetId: string, template: NewLaunchTemplate): LaunchTemplate;
  retireTemplate(fleetId: string, generation: number): void;
  /** Newest active generation */
  getActiveTemplate(fleetId: string): LaunchTemplate | null;
  listTemplates(fleetId: string): LaunchTemplate[];

  insertMember(member: NewFleetMember): FleetMember;
  getMember(id: string): FleetMember | null;
  /** Oldest generation first, then by launch time */
  listMembers(fleetId: string, statuses?: readonly MemberStatus[]): FleetMember[];
  transitionMember(id: string, to: MemberStatus, details?: { lastError?: string }): FleetMember;
  setMemberAddress(id: string, address: string | null): void;

  insertRefreshRun(run: Pick<RefreshRun, "fleetId" | "targetGeneration" | "totalToReplace">): RefreshRun;
  getRefreshRun(id: string): RefreshRun | null;
  getActiveRefreshRun(fleetId: string): RefreshRun | null;
  listRefreshRuns(fleetId: string): RefreshRun[];
  /** Terminal statuses also stamp `finishedAt`. */
  updateRefreshRun(id: string, update: RefreshRunUpdate): RefreshRun;
  /** Mark runs left in_progress by a previous process. Returns how many. */
  abandonStaleRefreshRuns(): number;
}
