import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/** Fleet members: one row per instance launched into a fleet. */
export const fleetMembers = sqliteTable(
  "fleet_members",
  {
    id: text("id").primaryKey(),
    fleetId: text("fleet_id").notNull(),
    /** Provider instance ID (droplet ID) */
    instanceId: text("instance_id").notNull(),
    /** Launch template generation the member was built from */
    generation: integer("generation").notNull(),
    subnetId: text("subnet_id").notNull(),
    /** Private or public IP once known */
    address: text("address"),
    /** launching | in_service | unhealthy | terminating | terminated */
    status: text("status").notNull(),
    lastError: text("last_error"),
    launchedAt: integer("launched_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => [
    index("idx_fleet_members_fleet_status").on(table.fleetId, table.status),
    index("idx_fleet_members_instance").on(table.instanceId),
  ],
);
