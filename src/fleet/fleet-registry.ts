import { type CapacityGroupDeps, CapacityGroupController } from "./capacity-group.js";
import type { FleetRecord, IFleetRepository } from "./fleet-repository.js";

/** Builds controller dependencies for a fleet (probe choice follows its tier). */
export type ControllerDepsFactory = (fleet: Pick<FleetRecord, "id" | "healthMode">) => CapacityGroupDeps;

/**
 * One controller per fleet for the life of the process. Refresh idempotence
 * lives on the controller, so every caller must go through here.
 */
export class FleetRegistry {
  private readonly controllers = new Map<string, CapacityGroupController>();

  constructor(
    private readonly repo: IFleetRepository,
    private readonly depsFor: ControllerDepsFactory,
  ) {}

  /** The fleet's controller, loaded from the store on first use. */
  get(fleetId: string): CapacityGroupController | null {
    const cached = this.controllers.get(fleetId);
    if (cached) return cached;
    const fleet = this.repo.getFleet(fleetId);
    if (!fleet) return null;
    const controller = CapacityGroupController.load(this.depsFor(fleet), fleetId);
    this.controllers.set(fleetId, controller);
    return controller;
  }

  register(controller: CapacityGroupController): void {
    this.controllers.set(controller.fleetId, controller);
  }

  remove(fleetId: string): void {
    this.controllers.delete(fleetId);
  }

  /** Every stored fleet that is not being deleted. */
  list(): CapacityGroupController[] {
    const result: CapacityGroupController[] = [];
    for (const fleet of this.repo.listFleets()) {
      if (fleet.status !== "active") continue;
      const controller = this.get(fleet.id);
      if (controller) result.push(controller);
    }
    return result;
  }
}
