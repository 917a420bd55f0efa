import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import { createDb } from "./index.js";
import { runMigrations } from "./migrate.js";

describe("runMigrations", () => {
  it("creates the fleet state tables on a fresh database", () => {
    const sqlite = new Database(":memory:");
    const db = createDb(sqlite);
    runMigrations(db);
    const tables = sqlite.prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name").all() as {
      name: string;
    }[];
    const tableNames = tables.map((t) => t.name);
    expect(tableNames).toContain("fleets");
    expect(tableNames).toContain("launch_templates");
    expect(tableNames).toContain("fleet_members");
    expect(tableNames).toContain("refresh_runs");
    sqlite.close();
  });

  it("can run twice on the same database", () => {
    const sqlite = new Database(":memory:");
    const db = createDb(sqlite);
    runMigrations(db);
    runMigrations(db);
    sqlite.close();
  });
});
