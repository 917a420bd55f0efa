/** Where a launched instance is in the provider's view. */
export type InstanceState = "pending" | "running" | "stopped" | "gone";

export interface LaunchRequest {
  name: string;
  fleetTag: string;
  instanceType: string;
  amiReference: string;
  subnetId: string;
  userData: string;
}

export interface InstanceDescription {
  instanceId: string;
  state: InstanceState;
  /** Private address once the provider assigned one */
  address: string | null;
}

/**
 * Provider seam for the capacity group. The controller never talks to the
 * provider API directly.
 */
export interface InstanceDriver {
  launch(request: LaunchRequest): Promise<InstanceDescription>;
  describe(instanceId: string): Promise<InstanceDescription>;
  /** Resolves when the instance is gone or going; a missing instance is not an error. */
  terminate(instanceId: string): Promise<void>;
}
