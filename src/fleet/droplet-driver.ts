import { logger } from "../config/logger.js";
import { type DOClient, type DODroplet, isNotFound } from "./do-client.js";
import type { InstanceDescription, InstanceDriver, InstanceState, LaunchRequest } from "./instance-driver.js";

export type DropletApi = Pick<DOClient, "createDroplet" | "getDroplet" | "deleteDroplet">;

function toState(status: DODroplet["status"]): InstanceState {
  switch (status) {
    case "new":
      return "pending";
    case "active":
      return "running";
    case "off":
      return "stopped";
    case "archive":
      return "gone";
  }
}

function describeDroplet(droplet: DODroplet): InstanceDescription {
  const net =
    droplet.networks.v4.find((n) => n.type === "private") ?? droplet.networks.v4.find((n) => n.type === "public");
  return { instanceId: String(droplet.id), state: toState(droplet.status), address: net?.ip_address ?? null };
}

function toDropletId(instanceId: string): number {
  const id = Number.parseInt(instanceId, 10);
  if (Number.isNaN(id)) throw new Error(`Invalid droplet ID: ${instanceId}`);
  return id;
}

/** Fleet members as DigitalOcean droplets. */
export class DropletInstanceDriver implements InstanceDriver {
  private readonly doClient: DropletApi;
  private readonly region: string;
  private readonly sshKeyIds: number[];

  constructor(doClient: DropletApi, options: { region: string; sshKeyIds?: number[] }) {
    this.doClient = doClient;
    this.region = options.region;
    this.sshKeyIds = options.sshKeyIds ?? [];
  }

  async launch(request: LaunchRequest): Promise<InstanceDescription> {
    const droplet = await this.doClient.createDroplet({
      name: request.name,
      region: this.region,
      size: request.instanceType,
      image: request.amiReference,
      ssh_keys: this.sshKeyIds,
      tags: [request.fleetTag],
      vpc_uuid: request.subnetId,
      user_data: request.userData,
    });
    logger.info(`Droplet ${droplet.id} launched for ${request.fleetTag}`, { name: request.name });
    return describeDroplet(droplet);
  }

  async describe(instanceId: string): Promise<InstanceDescription> {
    try {
      return describeDroplet(await this.doClient.getDroplet(toDropletId(instanceId)));
    } catch (err) {
      if (isNotFound(err)) return { instanceId, state: "gone", address: null };
      throw err;
    }
  }

  async terminate(instanceId: string): Promise<void> {
    try {
      await this.doClient.deleteDroplet(toDropletId(instanceId));
    } catch (err) {
      if (isNotFound(err)) {
        logger.debug(`Droplet ${instanceId} already gone`);
        return;
      }
      throw err;
    }
  }
}
