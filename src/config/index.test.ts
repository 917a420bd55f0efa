import { describe, expect, it } from "vitest";
import { configSchema, DEFAULT_FALLBACK_INGRESS_CIDR } from "./index.js";

describe("configSchema", () => {
  it("fills every default from an empty environment", () => {
    const config = configSchema.parse({});
    expect(config.port).toBe(3100);
    expect(config.dbPath).toBe("/data/fleet/fleet.db");
    expect(config.digitalocean).toEqual({ token: "", region: "nyc1", sshKeyIds: [] });
    expect(config.security.fallbackIngressCidr).toBe(DEFAULT_FALLBACK_INGRESS_CIDR);
    expect(config.dispatcher.enabled).toBe(true);
    expect(config.watchdog.intervalMs).toBe(60_000);
  });

  it("coerces numeric env strings", () => {
    const config = configSchema.parse({ port: "8080", watchdog: { intervalMs: "5000" } });
    expect(config.port).toBe(8080);
    expect(config.watchdog.intervalMs).toBe(5000);
  });

  it("reads the dispatcher flag from env strings", () => {
    expect(configSchema.parse({ dispatcher: { enabled: "false" } }).dispatcher.enabled).toBe(false);
    expect(configSchema.parse({ dispatcher: { enabled: "1" } }).dispatcher.enabled).toBe(true);
    expect(configSchema.parse({ dispatcher: { enabled: "" } }).dispatcher.enabled).toBe(true);
  });

  it("rejects a dispatcher URL that is not a URL", () => {
    expect(() => configSchema.parse({ dispatcher: { apiUrl: "fleet-api" } })).toThrow();
  });

  it("rejects a non-positive watchdog interval", () => {
    expect(() => configSchema.parse({ watchdog: { intervalMs: "0" } })).toThrow();
  });
});
