import type Database from "better-sqlite3";

/**
 * Pragmas every fleet state database is opened with.
 *
 * - journal_mode = WAL: the HTTP API can read while a refresh writes
 * - busy_timeout = 5000: wait for the write lock instead of SQLITE_BUSY
 * - synchronous = NORMAL: safe under WAL, fewer fsyncs per member update
 */
export function applyPlatformPragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("synchronous = NORMAL");
}
