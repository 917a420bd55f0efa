import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { logger } from "../config/logger.js";
import { InvalidConfigurationError } from "./errors.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Token the instance replaces with its short hostname at boot. */
export const HOSTNAME_PLACEHOLDER = "PLACEHOLDER_HOSTNAME";

/** Spliced into a sed expression on the instance, so no metacharacters. */
const TOKEN_PATTERN = /^[A-Za-z0-9_]+$/;

export const DEFAULT_MONITORING_TEMPLATE = path.resolve(__dirname, "../../templates/monitoring-config.json");

/** Where cloud-init drops the payload on the instance. */
export const PAYLOAD_PATH = "/etc/fleet/monitoring-config.json";

export const MONITORING_AGENT_PACKAGE = "amazon-cloudwatch-agent";

/**
 * Opaque monitoring configuration handed to every instance. Content is never
 * parsed; only the placeholder token is counted.
 */
export class BootstrapPayload {
  readonly digest: string;
  private readonly content: Buffer;

  constructor(
    content: Buffer,
    readonly hostnamePlaceholderToken: string,
    readonly tokenOccurrences: number,
  ) {
    this.content = Buffer.from(content);
    this.digest = createHash("sha256").update(this.content).digest("hex");
  }

  /** A copy; the payload itself never changes. */
  get rawContent(): Buffer {
    return Buffer.from(this.content);
  }

  toString(): string {
    return this.content.toString("utf-8");
  }
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}

/**
 * Package a monitoring template verbatim.
 *
 * The token may appear once, or not at all (boot then leaves the content
 * alone). More than one occurrence is a configuration error.
 */
export function buildBootstrapPayload(
  template: string | Buffer,
  token: string = HOSTNAME_PLACEHOLDER,
): BootstrapPayload {
  if (!TOKEN_PATTERN.test(token)) {
    throw new InvalidConfigurationError(`Invalid hostname placeholder token "${token}": must match [A-Za-z0-9_]+`);
  }
  const content = typeof template === "string" ? Buffer.from(template, "utf-8") : template;
  const occurrences = countOccurrences(content.toString("utf-8"), token);

  if (occurrences > 1) {
    throw new InvalidConfigurationError(
      `Hostname placeholder ${token} appears ${occurrences} times in the bootstrap payload; at most one is allowed`,
    );
  }
  if (occurrences === 0) {
    logger.debug("Bootstrap payload has no hostname placeholder", { token });
  }
  return new BootstrapPayload(content, token, occurrences);
}

/** Fill the fleet identifier into the monitoring config template. */
export function renderMonitoringConfig(fleetId: string, templatePath: string = DEFAULT_MONITORING_TEMPLATE): string {
  if (!fs.existsSync(templatePath)) {
    throw new InvalidConfigurationError(`Monitoring template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8").replaceAll("{{FLEET_ID}}", fleetId);
}

/** `hostname -s`: everything before the first dot. */
export function shortHostname(hostname: string): string {
  const dot = hostname.indexOf(".");
  return dot === -1 ? hostname : hostname.slice(0, dot);
}

/** What the instance does at boot, for tests and previews. */
export function substituteHostname(payload: BootstrapPayload, hostname: string): string {
  return payload.toString().split(payload.hostnamePlaceholderToken).join(shortHostname(hostname));
}

/** Install one package with whichever package manager the image has. */
function installCommand(pkg: string): string {
  return [
    `(command -v apt-get >/dev/null && apt-get update -y && apt-get install -y ${pkg})`,
    `(command -v dnf >/dev/null && dnf install -y ${pkg})`,
    `(command -v yum >/dev/null && yum install -y ${pkg})`,
    "true",
  ].join(" || ");
}

/**
 * Render the cloud-init user data for a fleet member. Every boot step is
 * best-effort and each package installs on its own, so an agent missing from
 * the image's repositories never keeps nginx off port 80. A failure shows up
 * only as a failed health check.
 */
export function generateCloudInit(payload: BootstrapPayload): string {
  const token = payload.hostnamePlaceholderToken;
  const encoded = payload.rawContent.toString("base64");
  return `#cloud-config
write_files:
  - path: ${PAYLOAD_PATH}
    encoding: b64
    permissions: "0644"
    content: ${encoded}
  - path: /etc/nginx/conf.d/00-health.conf
    permissions: "0644"
    content: |
      server {
          listen 80;
          server_name _;
          location / { return 200 'ok'; }
      }

runcmd:
  - sed -i "s/${token}/$(hostname -s)/g" ${PAYLOAD_PATH} || true
  - ${installCommand("nginx")}
  - rm -f /etc/nginx/sites-enabled/default || true
  - systemctl enable nginx || true
  - systemctl restart nginx || true
  - ${installCommand(MONITORING_AGENT_PACKAGE)}
  - /opt/aws/amazon-cloudwatch-agent/bin/amazon-cloudwatch-agent-ctl -a fetch-config -m onPremise -c file:${PAYLOAD_PATH} -s || true
`;
}
