import path from "node:path";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import type { DrizzleDb } from "./index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Apply all pending Drizzle migrations.
 *
 * Resolved relative to this file so both src/db (tests) and dist/db
 * (production) find <root>/drizzle/migrations.
 */
export function runMigrations(db: DrizzleDb): void {
  const migrationsFolder = path.resolve(__dirname, "../../drizzle/migrations");
  migrate(db, { migrationsFolder });
}
