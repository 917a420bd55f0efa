/**
 * Fleet member lifecycle. The repository's transition() enforces this graph;
 * nothing else writes member status.
 */

export const MEMBER_STATUSES = ["launching", "in_service", "unhealthy", "terminating", "terminated"] as const;

export type MemberStatus = (typeof MEMBER_STATUSES)[number];

/**
 * ```
 * launching   → in_service, unhealthy, terminating
 * in_service  → unhealthy, terminating
 * unhealthy   → in_service, terminating
 * terminating → terminated
 * terminated  → (none)
 * ```
 */
export const VALID_TRANSITIONS: Record<MemberStatus, readonly MemberStatus[]> = {
  launching: ["in_service", "unhealthy", "terminating"],
  in_service: ["unhealthy", "terminating"],
  unhealthy: ["in_service", "terminating"],
  terminating: ["terminated"],
  terminated: [],
};

/** Statuses that still hold a live instance. */
export const LIVE_STATUSES: readonly MemberStatus[] = ["launching", "in_service", "unhealthy"];

export function isValidTransition(from: MemberStatus, to: MemberStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isMemberStatus(value: string): value is MemberStatus {
  return MEMBER_STATUSES.some((s) => s === value);
}

export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: MemberStatus, to: MemberStatus) {
    super(`Invalid member transition: ${from} → ${to}`);
  }
}

/** The stored status no longer matches what the caller read. */
export class ConcurrentTransitionError extends Error {
  readonly name = "ConcurrentTransitionError" as const;
  constructor(memberId: string) {
    super(`Concurrent transition conflict on member ${memberId}`);
  }
}

export class MemberNotFoundError extends Error {
  readonly name = "MemberNotFoundError" as const;
  constructor(memberId: string) {
    super(`Member not found: ${memberId}`);
  }
}
