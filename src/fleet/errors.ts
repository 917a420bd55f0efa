/**
 * Fleet error taxonomy.
 *
 * Configuration errors are fatal and raised before any provider call.
 * Dispatch failures are logged and left for the next scheduled tick.
 */

/** A fleet definition that cannot be provisioned as written. */
export class InvalidConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [message],
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

/** `minSize ≤ desiredCapacity ≤ maxSize` does not hold. */
export class InvalidCapacityRangeError extends InvalidConfigurationError {
  constructor(
    public readonly minSize: number,
    public readonly desiredCapacity: number,
    public readonly maxSize: number,
  ) {
    super(
      `Invalid capacity range: expected minSize (${minSize}) <= desiredCapacity (${desiredCapacity}) <= maxSize (${maxSize})`,
    );
    this.name = "InvalidCapacityRangeError";
  }
}

export class FleetNotFoundError extends Error {
  constructor(public readonly fleetId: string) {
    super(`Fleet not found: ${fleetId}`);
    this.name = "FleetNotFoundError";
  }
}

/** A capacity edit carried a stale version. */
export class CapacityVersionConflictError extends Error {
  constructor(
    public readonly fleetId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(`Capacity of fleet ${fleetId} is at version ${actualVersion}, not ${expectedVersion}`);
    this.name = "CapacityVersionConflictError";
  }
}

/** The controller refused to start a refresh (not an in-progress duplicate). */
export class RefreshRejectedError extends Error {
  constructor(
    public readonly fleetId: string,
    public readonly reason: string,
  ) {
    super(`Refresh of fleet ${fleetId} rejected: ${reason}`);
    this.name = "RefreshRejectedError";
  }
}

/** The dispatcher's trigger call failed; the next tick is the retry. */
export class TransientDispatchFailure extends Error {
  constructor(
    public readonly fleetId: string,
    options?: { cause?: unknown },
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Refresh dispatch for fleet ${fleetId} failed${detail}`, options);
    this.name = "TransientDispatchFailure";
  }
}
