import { describe, expect, it } from "vitest";
import { healthyFloor } from "./rolling-refresh.js";

describe("healthyFloor", () => {
  it.each([
    [{ desiredCapacity: 10, minSize: 2, maxSize: 12, version: 1 }, 90, 9],
    [{ desiredCapacity: 3, minSize: 2, maxSize: 5, version: 1 }, 90, 3],
    [{ desiredCapacity: 1, minSize: 1, maxSize: 2, version: 1 }, 90, 1],
    [{ desiredCapacity: 5, minSize: 0, maxSize: 5, version: 1 }, 0, 0],
    [{ desiredCapacity: 4, minSize: 3, maxSize: 6, version: 1 }, 50, 3],
  ])("%o at %i%% keeps %i in service", (capacity, pct, expected) => {
    expect(healthyFloor(capacity, pct)).toBe(expected);
  });

  it("never exceeds maxSize", () => {
    expect(healthyFloor({ desiredCapacity: 2, minSize: 2, maxSize: 2, version: 1 }, 100)).toBe(2);
  });
});
