import type Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle database handle over better-sqlite3. Repositories accept this type. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create a Drizzle database instance wrapping the given SQLite handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

export { schema };
export { applyPlatformPragmas } from "./pragmas.js";
