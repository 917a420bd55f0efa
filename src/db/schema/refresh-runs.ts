import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/** Rolling refresh runs. At most one run per fleet is "in_progress". */
export const refreshRuns = sqliteTable(
  "refresh_runs",
  {
    id: text("id").primaryKey(),
    fleetId: text("fleet_id").notNull(),
    /** in_progress | succeeded | failed | cancelled | abandoned */
    status: text("status").notNull(),
    targetGeneration: integer("target_generation").notNull(),
    totalToReplace: integer("total_to_replace").notNull(),
    replaced: integer("replaced").notNull().default(0),
    statusReason: text("status_reason"),
    startedAt: integer("started_at").notNull(),
    finishedAt: integer("finished_at"),
  },
  (table) => [index("idx_refresh_runs_fleet_status").on(table.fleetId, table.status)],
);
