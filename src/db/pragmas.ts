import type Database from "better-sqlite3";

/**
 * Apply the standard pragmas to a session database handle.
 *
 * - journal_mode = WAL: concurrent readers alongside the single writer
 * - busy_timeout = 5000: wait up to 5 seconds for the write lock instead of
 *   failing immediately with SQLITE_BUSY
 */
export function applySqlitePragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
}
