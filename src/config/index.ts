import { z } from "zod";

/** Private-network range used for fleet ingress when no traffic tier exists. */
export const DEFAULT_FALLBACK_INGRESS_CIDR = "10.0.0.0/8";

/**
 * Parse a comma-separated list of numeric SSH key IDs.
 * Example: "1234,5678"
 */
function parseSshKeyIds(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry) => {
      const id = Number.parseInt(entry, 10);
      if (Number.isNaN(id)) {
        throw new Error(`Invalid DO_SSH_KEY_IDS entry "${entry}": not a number`);
      }
      return id;
    });
}

/** Env booleans arrive as strings; only "true"/"1" enable a flag. */
const envBoolean = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((v) => {
      if (v === undefined || v === "") return fallback;
      if (typeof v === "boolean") return v;
      return v === "true" || v === "1";
    });

export const dispatcherConfigSchema = z.object({
  enabled: envBoolean(true),
  /** When set, the dispatcher triggers refreshes over HTTP instead of in-process. */
  apiUrl: z.string().url().optional(),
  token: z.string().optional(),
});

export const configSchema = z.object({
  port: z.coerce.number().default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  dbPath: z.string().min(1).default("/data/fleet/fleet.db"),
  definitionPath: z.string().min(1).default("./fleet.yaml"),

  /** DigitalOcean provider settings. */
  digitalocean: z
    .object({
      token: z.string().default(""),
      region: z.string().min(1).default("nyc1"),
      sshKeyIds: z.array(z.number().int()).default([]),
    })
    .default({ token: "", region: "nyc1", sshKeyIds: [] }),

  security: z
    .object({
      fallbackIngressCidr: z.string().min(1).default(DEFAULT_FALLBACK_INGRESS_CIDR),
    })
    .default({ fallbackIngressCidr: DEFAULT_FALLBACK_INGRESS_CIDR }),

  dispatcher: dispatcherConfigSchema.default({ enabled: true }),

  watchdog: z
    .object({
      intervalMs: z.coerce.number().int().positive().default(60_000),
    })
    .default({ intervalMs: 60_000 }),
});

export const config = configSchema.parse({
  port: process.env.PORT,
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  dbPath: process.env.FLEET_DB_PATH,
  definitionPath: process.env.FLEET_DEFINITION_PATH,
  digitalocean: {
    token: process.env.DO_API_TOKEN,
    region: process.env.DO_REGION,
    sshKeyIds: parseSshKeyIds(process.env.DO_SSH_KEY_IDS),
  },
  security: {
    fallbackIngressCidr: process.env.FLEET_FALLBACK_INGRESS_CIDR,
  },
  dispatcher: {
    enabled: process.env.REFRESH_DISPATCHER_ENABLED,
    apiUrl: process.env.REFRESH_API_URL || undefined,
    token: process.env.REFRESH_API_TOKEN,
  },
  watchdog: {
    intervalMs: process.env.FLEET_WATCHDOG_INTERVAL_MS,
  },
});

export type Config = z.infer<typeof configSchema>;
