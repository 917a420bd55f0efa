import { z } from "zod";
import type { FleetState } from "./capacity-group.js";
import { FleetNotFoundError, RefreshRejectedError } from "./errors.js";
import type { FleetRegistry } from "./fleet-registry.js";

export type { FleetState };

export type StartRefreshResult =
  | { outcome: "accepted"; refreshId: string; alreadyInProgress: boolean }
  | { outcome: "rejected"; reason: string };

/**
 * What the dispatcher is allowed to do: look a fleet up and ask for a
 * refresh. Nothing else.
 */
export interface RefreshTriggerApi {
  describe(fleetId: string): Promise<FleetState | null>;
  /** Throws FleetNotFoundError for an unknown fleet. */
  startRefresh(fleetId: string): Promise<StartRefreshResult>;
}

/** In-process trigger over the fleet registry. */
export class LocalRefreshApi implements RefreshTriggerApi {
  constructor(private readonly registry: FleetRegistry) {}

  async describe(fleetId: string): Promise<FleetState | null> {
    return this.registry.get(fleetId)?.describe() ?? null;
  }

  async startRefresh(fleetId: string): Promise<StartRefreshResult> {
    const controller = this.registry.get(fleetId);
    if (!controller) throw new FleetNotFoundError(fleetId);
    try {
      const start = controller.startRollingRefresh();
      return { outcome: "accepted", ...start };
    } catch (err) {
      if (err instanceof RefreshRejectedError) return { outcome: "rejected", reason: err.reason };
      throw err;
    }
  }
}

/** Non-2xx answer from the fleet HTTP API. */
export class RefreshApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(`Fleet API error ${status}: ${message}`);
    this.name = "RefreshApiError";
  }
}

const capacitySchema = z.object({
  desiredCapacity: z.number(),
  minSize: z.number(),
  maxSize: z.number(),
  version: z.number(),
});

const fleetStateSchema = z.object({
  fleetId: z.string(),
  status: z.enum(["active", "deleting"]),
  healthMode: z.enum(["endpoint-health", "self-reported"]),
  capacity: capacitySchema,
  activeGeneration: z.number().nullable(),
  members: z.object({
    launching: z.number(),
    in_service: z.number(),
    unhealthy: z.number(),
    terminating: z.number(),
    terminated: z.number(),
  }),
  activeRefresh: z
    .object({
      id: z.string(),
      targetGeneration: z.number(),
      totalToReplace: z.number(),
      replaced: z.number(),
      startedAt: z.number(),
    })
    .nullable(),
  address: z.string().nullable(),
});

const acceptedSchema = z.object({ refreshId: z.string(), alreadyInProgress: z.boolean() });
const errorBodySchema = z.object({ error: z.string().optional(), reason: z.string().optional() });

/** Trigger through `/fleets` on another orchestrator process. */
export class HttpRefreshApi implements RefreshTriggerApi {
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(options: { baseUrl: string; token: string }) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
  }

  async describe(fleetId: string): Promise<FleetState | null> {
    const res = await fetch(`${this.baseUrl}/fleets/${encodeURIComponent(fleetId)}`, {
      method: "GET",
      headers: this.headers(),
    });
    if (res.status === 404) return null;
    if (!res.ok) throw await this.toError(res);
    return fleetStateSchema.parse(await res.json());
  }

  async startRefresh(fleetId: string): Promise<StartRefreshResult> {
    const res = await fetch(`${this.baseUrl}/fleets/${encodeURIComponent(fleetId)}/refresh`, {
      method: "POST",
      headers: this.headers(),
    });
    if (res.status === 404) throw new FleetNotFoundError(fleetId);
    if (res.status === 409) {
      const body = errorBodySchema.safeParse(await res.json().catch(() => ({})));
      return { outcome: "rejected", reason: (body.success && (body.data.reason ?? body.data.error)) || "rejected" };
    }
    if (!res.ok) throw await this.toError(res);
    return { outcome: "accepted", ...acceptedSchema.parse(await res.json()) };
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  private async toError(res: Response): Promise<RefreshApiError> {
    const body = errorBodySchema.safeParse(await res.json().catch(() => ({})));
    return new RefreshApiError(res.status, (body.success && body.data.error) || res.statusText);
  }
}
