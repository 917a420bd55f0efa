import Database from "better-sqlite3";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { applyPlatformPragmas, createDb, type DrizzleDb } from "../db/index.js";
import { runMigrations } from "../db/migrate.js";
import { captureError } from "../observability/sentry.js";
import type { CapacityGroupDeps } from "./capacity-group.js";
import { DOClient } from "./do-client.js";
import { DropletInstanceDriver } from "./droplet-driver.js";
import { DrizzleFleetRepository } from "./drizzle-fleet-repository.js";
import { loadFleetDefinition } from "./fleet-definition.js";
import { FleetProvisioner } from "./fleet-provisioner.js";
import { FleetRegistry } from "./fleet-registry.js";
import type { FleetRecord, IFleetRepository } from "./fleet-repository.js";
import { FleetWatchdog } from "./fleet-watchdog.js";
import { createHealthProbe } from "./health-probe.js";
import type { InstanceDriver } from "./instance-driver.js";
import { HttpRefreshApi, LocalRefreshApi, type RefreshTriggerApi } from "./refresh-api.js";
import { RefreshDispatcher } from "./refresh-dispatcher.js";
import { TrafficTierProvisioner } from "./traffic-tier.js";
import type { FleetDefinition } from "./types.js";

/**
 * Shared lazy-initialized fleet singletons.
 * Everything that needs the state store or a controller imports from here,
 * so there is exactly one registry (and so one controller per fleet).
 *
 * Nothing runs at import time; all initialization is deferred to first call.
 */

let _sqlite: Database.Database | null = null;
let _db: DrizzleDb | null = null;
let _fleetRepo: IFleetRepository | null = null;
let _definition: FleetDefinition | null = null;

let _doClient: DOClient | null = null;
let _driver: InstanceDriver | null = null;
let _tierProvisioner: TrafficTierProvisioner | null = null;

let _registry: FleetRegistry | null = null;
let _provisioner: FleetProvisioner | null = null;
let _refreshApi: RefreshTriggerApi | null = null;
let _watchdog: FleetWatchdog | null = null;
let _dispatcher: RefreshDispatcher | null = null;

const DEFAULT_SCHEDULE = { minHealthyPercentage: 90, instanceWarmupSeconds: 300 };

// ---------------------------------------------------------------------------
// State store
// ---------------------------------------------------------------------------

/** Open the state database, apply pragmas and pending migrations. */
export function getDb(): DrizzleDb {
  if (!_db) {
    _sqlite = new Database(config.dbPath);
    applyPlatformPragmas(_sqlite);
    _db = createDb(_sqlite);
    runMigrations(_db);
  }
  return _db;
}

export function getFleetRepo(): IFleetRepository {
  if (!_fleetRepo) {
    _fleetRepo = new DrizzleFleetRepository(getDb());
  }
  return _fleetRepo;
}

/** The operator's fleet definition, validated once. */
export function getFleetDefinition(): FleetDefinition {
  if (!_definition) {
    _definition = loadFleetDefinition(config.definitionPath, {
      fallbackIngressCidr: config.security.fallbackIngressCidr,
    });
  }
  return _definition;
}

// ---------------------------------------------------------------------------
// Infrastructure
// ---------------------------------------------------------------------------

export function getDOClient(): DOClient {
  if (!_doClient) {
    if (!config.digitalocean.token) throw new Error("DO_API_TOKEN environment variable is required");
    _doClient = new DOClient(config.digitalocean.token);
  }
  return _doClient;
}

export function getInstanceDriver(): InstanceDriver {
  if (!_driver) {
    _driver = new DropletInstanceDriver(getDOClient(), {
      region: config.digitalocean.region,
      sshKeyIds: config.digitalocean.sshKeyIds,
    });
  }
  return _driver;
}

export function getTierProvisioner(): TrafficTierProvisioner {
  if (!_tierProvisioner) {
    _tierProvisioner = new TrafficTierProvisioner(getDOClient(), { region: config.digitalocean.region });
  }
  return _tierProvisioner;
}

// ---------------------------------------------------------------------------
// Controllers
// ---------------------------------------------------------------------------

/** Controller dependencies; the probe follows the fleet's stored health mode. */
export function controllerDepsFor(fleet: Pick<FleetRecord, "id" | "healthMode">): CapacityGroupDeps {
  const driver = getInstanceDriver();
  const probe = createHealthProbe(fleet.healthMode, driver);
  const definition = getFleetDefinition();
  const schedule = definition.fleet.name === fleet.id ? definition.schedule : DEFAULT_SCHEDULE;
  return {
    repo: getFleetRepo(),
    driver,
    probe,
    schedule,
    healthTimeoutMs: Math.max(600_000, schedule.instanceWarmupSeconds * 2_000),
  };
}

export function getRegistry(): FleetRegistry {
  if (!_registry) {
    _registry = new FleetRegistry(getFleetRepo(), controllerDepsFor);
  }
  return _registry;
}

export function getProvisioner(): FleetProvisioner {
  if (!_provisioner) {
    _provisioner = new FleetProvisioner({
      repo: getFleetRepo(),
      registry: getRegistry(),
      depsFor: controllerDepsFor,
      tiers: getTierProvisioner(),
      firewalls: getDOClient(),
    });
  }
  return _provisioner;
}

/** In-process unless REFRESH_API_URL points the dispatcher at another instance. */
export function getRefreshApi(): RefreshTriggerApi {
  if (!_refreshApi) {
    const { apiUrl, token } = config.dispatcher;
    _refreshApi = apiUrl ? new HttpRefreshApi({ baseUrl: apiUrl, token: token ?? "" }) : new LocalRefreshApi(getRegistry());
  }
  return _refreshApi;
}

// ---------------------------------------------------------------------------
// Background loops
// ---------------------------------------------------------------------------

export function getFleetWatchdog(): FleetWatchdog {
  if (!_watchdog) {
    _watchdog = new FleetWatchdog(getRegistry(), { checkIntervalMs: config.watchdog.intervalMs });
  }
  return _watchdog;
}

export function getRefreshDispatcher(): RefreshDispatcher {
  if (!_dispatcher) {
    _dispatcher = new RefreshDispatcher(getRefreshApi(), getFleetDefinition().schedule, {
      onOutcome: (outcome) => {
        if (outcome.status === "error" && outcome.failure) {
          captureError(outcome.failure, { fleetId: outcome.fleetId, source: "refresh-dispatcher" });
        }
      },
    });
  }
  return _dispatcher;
}

/**
 * Call once at startup: close out refresh runs a previous process left
 * behind, then bring the configured fleet into existence.
 */
export async function initFleet(): Promise<void> {
  const abandoned = getFleetRepo().abandonStaleRefreshRuns();
  if (abandoned > 0) {
    logger.warn(`Marked ${abandoned} interrupted refresh run(s) abandoned`);
  }
  const { created } = await getProvisioner().ensureFleet(getFleetDefinition());
  logger.info(`Fleet ${getFleetDefinition().fleet.name} ready`, { created });
}

/** Stop background loops and close the state database. */
export function shutdownFleet(): void {
  _dispatcher?.stop();
  _watchdog?.stop();
  _sqlite?.close();
}
