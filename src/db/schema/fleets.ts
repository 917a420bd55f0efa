import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * Fleets table: one row per capacity group.
 * The capacity columns are a versioned value: every accepted edit bumps
 * `capacity_version`, and writers compare-and-swap on it.
 */
export const fleets = sqliteTable(
  "fleets",
  {
    /** Fleet name, unique within the store (e.g. "web-fleet") */
    id: text("id").primaryKey(),
    /** "active" | "deleting" */
    status: text("status").notNull().default("active"),
    /** Provider size slug used by the active template */
    instanceType: text("instance_type").notNull(),
    /** Image slug or snapshot ID used by the active template */
    amiReference: text("ami_reference").notNull(),
    /** Ordered VPC/subnet identifiers members are spread across */
    subnetIds: text("subnet_ids", { mode: "json" }).$type<string[]>().notNull(),
    desiredCapacity: integer("desired_capacity").notNull(),
    minSize: integer("min_size").notNull(),
    maxSize: integer("max_size").notNull(),
    capacityVersion: integer("capacity_version").notNull().default(1),
    /** "endpoint-health" | "self-reported", derived from the traffic tier */
    healthMode: text("health_mode").notNull(),
    /** "absent" | "present" */
    trafficTier: text("traffic_tier").notNull(),
    /** Load balancer ID when the traffic tier is present */
    balancerId: text("balancer_id"),
    /** Firewall ID holding the fleet's ingress policy */
    firewallId: text("firewall_id"),
    /** Range the firewall admits on port 80 when there is no traffic tier */
    ingressCidr: text("ingress_cidr"),
    /** Effective address for discovery (balancer IP or caller-supplied fallback) */
    address: text("address"),
    /** Unix epoch seconds */
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => [index("idx_fleets_status").on(table.status)],
);
