import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

/**
 * Launch template generations. A new generation is inserted before the
 * previous one is retired, so a fleet always has a template to launch from.
 */
export const launchTemplates = sqliteTable(
  "launch_templates",
  {
    id: text("id").primaryKey(),
    fleetId: text("fleet_id").notNull(),
    generation: integer("generation").notNull(),
    instanceType: text("instance_type").notNull(),
    amiReference: text("ami_reference").notNull(),
    /** Rendered cloud-init user data */
    userData: text("user_data").notNull(),
    /** sha256 of the bootstrap payload packaged into userData */
    payloadDigest: text("payload_digest").notNull(),
    /** "active" | "retired" */
    status: text("status").notNull(),
    createdAt: integer("created_at").notNull(),
    retiredAt: integer("retired_at"),
  },
  (table) => [
    uniqueIndex("idx_launch_templates_fleet_generation").on(table.fleetId, table.generation),
    index("idx_launch_templates_status").on(table.fleetId, table.status),
  ],
);
