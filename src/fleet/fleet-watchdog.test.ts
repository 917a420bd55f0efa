import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "../config/logger.js";
import type { ReconcileReport } from "./capacity-group.js";
import { FleetWatchdog } from "./fleet-watchdog.js";

const QUIET: ReconcileReport = {
  skipped: null,
  promoted: [],
  markedUnhealthy: [],
  lost: [],
  launched: [],
  terminated: [],
};

function makeController(fleetId: string, reconcile = vi.fn().mockResolvedValue(QUIET)) {
  return { fleetId, reconcile };
}

describe("FleetWatchdog", () => {
  let controllers: ReturnType<typeof makeController>[];
  let watchdog: FleetWatchdog;

  beforeEach(() => {
    vi.useFakeTimers();
    controllers = [makeController("web"), makeController("api")];
    const registry = { list: () => controllers };
    watchdog = new FleetWatchdog(registry, { checkIntervalMs: 1000 });
  });

  afterEach(() => {
    watchdog.stop();
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it("reconciles every fleet on each interval", async () => {
    watchdog.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(controllers[0].reconcile).toHaveBeenCalledTimes(1);
    expect(controllers[1].reconcile).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(controllers[0].reconcile).toHaveBeenCalledTimes(2);
  });

  it("keeps going when one fleet fails", async () => {
    controllers[0].reconcile.mockRejectedValue(new Error("provider down"));
    await watchdog.check();
    expect(controllers[1].reconcile).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Reconcile failed for fleet web", { error: "provider down" });
  });

  it("logs fleets that changed", async () => {
    controllers[1].reconcile.mockResolvedValue({ ...QUIET, launched: ["7"] });
    await watchdog.check();
    expect(logger.info).toHaveBeenCalledWith("Fleet api reconciled", {
      launched: ["7"],
      terminated: [],
      markedUnhealthy: [],
      lost: [],
    });
  });

  it("stops its timer", async () => {
    watchdog.start();
    watchdog.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(controllers[0].reconcile).not.toHaveBeenCalled();
  });
});
