/**
 * Migrations are generated from src/db/schema with `npm run db:generate`.
 * Review the SQL before committing: every migration must stay readable by
 * the previous release, so only add tables, nullable/defaulted columns and
 * indexes in place.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./src/db/schema/index.ts",
  out: "./drizzle/migrations",
  dialect: "sqlite",
  dbCredentials: { url: process.env.FLEET_DB_PATH || "./data/fleet.db" },
});
