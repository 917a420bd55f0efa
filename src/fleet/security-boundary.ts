import { DEFAULT_FALLBACK_INGRESS_CIDR } from "../config/index.js";
import type { TrafficTier } from "./types.js";

/** Port fleet members serve plain HTTP on. */
export const MEMBER_HTTP_PORT = 80;
/** Port the traffic tier terminates TLS on. */
export const TIER_HTTPS_PORT = 443;

const ANYWHERE = ["0.0.0.0/0", "::/0"] as const;

/** The single ingress rule fleet members accept. */
export type SecurityPolicy =
  | { sourceKind: "traffic_tier_group"; port: typeof MEMBER_HTTP_PORT; balancerId: string }
  | { sourceKind: "static_cidr_block"; port: typeof MEMBER_HTTP_PORT; cidr: string; isDefaultFallback: boolean };

/** Fleet members reach anything, in both tier variants. */
export const EGRESS_ALLOW_ALL = {
  protocols: ["tcp", "udp", "icmp"],
  destinations: ANYWHERE,
} as const;

/**
 * Pick the fleet's ingress rule. Total over the tier variant: a present tier
 * yields the tier-group rule, an absent tier the static block.
 */
export function resolveSecurityPolicy(
  tier: TrafficTier,
  fallbackCidr: string,
  balancerId: string | null = null,
): SecurityPolicy {
  switch (tier.kind) {
    case "present":
      if (!balancerId) {
        throw new Error("A present traffic tier needs its balancer ID to scope fleet ingress");
      }
      return { sourceKind: "traffic_tier_group", port: MEMBER_HTTP_PORT, balancerId };
    case "absent":
      return {
        sourceKind: "static_cidr_block",
        port: MEMBER_HTTP_PORT,
        cidr: fallbackCidr,
        isDefaultFallback: fallbackCidr === DEFAULT_FALLBACK_INGRESS_CIDR,
      };
    default: {
      const unreachable: never = tier;
      throw new Error(`Unknown traffic tier: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** Firewall rule shapes accepted by the DigitalOcean firewalls API. */
export interface FirewallInboundRule {
  protocol: "tcp" | "udp" | "icmp";
  ports: string;
  sources: { addresses?: string[]; load_balancer_uids?: string[] };
}

export interface FirewallOutboundRule {
  protocol: "tcp" | "udp" | "icmp";
  /** "0" means every port; icmp rules carry none */
  ports?: string;
  destinations: { addresses: string[] };
}

export interface FirewallRequest {
  name: string;
  tags: string[];
  inbound_rules: FirewallInboundRule[];
  outbound_rules: FirewallOutboundRule[];
}

/** Translate a policy into the firewall applied to every member tagged `fleetTag`. */
export function buildFirewallRequest(policy: SecurityPolicy, fleetTag: string): FirewallRequest {
  const sources =
    policy.sourceKind === "traffic_tier_group"
      ? { load_balancer_uids: [policy.balancerId] }
      : { addresses: [policy.cidr] };

  return {
    name: `${fleetTag}-ingress`,
    tags: [fleetTag],
    inbound_rules: [{ protocol: "tcp", ports: String(policy.port), sources }],
    outbound_rules: EGRESS_ALLOW_ALL.protocols.map((protocol) => ({
      protocol,
      ...(protocol === "icmp" ? {} : { ports: "0" }),
      destinations: { addresses: [...EGRESS_ALLOW_ALL.destinations] },
    })),
  };
}
