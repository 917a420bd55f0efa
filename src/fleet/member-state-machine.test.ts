import { describe, expect, it } from "vitest";
import {
  ConcurrentTransitionError,
  InvalidTransitionError,
  isMemberStatus,
  isValidTransition,
  LIVE_STATUSES,
  MEMBER_STATUSES,
  MemberNotFoundError,
  VALID_TRANSITIONS,
} from "./member-state-machine.js";

describe("VALID_TRANSITIONS", () => {
  it("has an entry for every status and no others", () => {
    expect(Object.keys(VALID_TRANSITIONS).sort()).toEqual([...MEMBER_STATUSES].sort());
  });

  it("only targets known statuses", () => {
    for (const targets of Object.values(VALID_TRANSITIONS)) {
      for (const to of targets) {
        expect(MEMBER_STATUSES).toContain(to);
      }
    }
  });

  it("makes terminated final", () => {
    expect(VALID_TRANSITIONS.terminated).toEqual([]);
  });

  it("lets every live status head for termination", () => {
    for (const status of LIVE_STATUSES) {
      expect(isValidTransition(status, "terminating")).toBe(true);
    }
  });
});

describe("isValidTransition", () => {
  it.each([
    ["launching", "in_service"],
    ["launching", "unhealthy"],
    ["in_service", "unhealthy"],
    ["unhealthy", "in_service"],
    ["terminating", "terminated"],
  ] as const)("allows %s → %s", (from, to) => {
    expect(isValidTransition(from, to)).toBe(true);
  });

  it.each([
    ["launching", "terminated"],
    ["in_service", "launching"],
    ["terminating", "in_service"],
    ["terminated", "launching"],
  ] as const)("rejects %s → %s", (from, to) => {
    expect(isValidTransition(from, to)).toBe(false);
  });
});

describe("isMemberStatus", () => {
  it("narrows stored strings", () => {
    expect(isMemberStatus("in_service")).toBe(true);
    expect(isMemberStatus("active")).toBe(false);
  });
});

describe("errors", () => {
  it("format their messages", () => {
    expect(new InvalidTransitionError("terminated", "launching").message).toBe(
      "Invalid member transition: terminated → launching",
    );
    expect(new ConcurrentTransitionError("m-1").message).toBe("Concurrent transition conflict on member m-1");
    expect(new MemberNotFoundError("m-1").name).toBe("MemberNotFoundError");
  });
});
