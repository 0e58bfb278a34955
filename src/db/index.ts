import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { applySqlitePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

export type Schema = typeof schema;

/** Drizzle handle over the session database. Repositories accept this type. */
export type SessionDb = BetterSQLite3Database<Schema>;

/** Create the sessions table and its indexes if they do not exist yet. */
export function initSessionSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      username TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(user_id);
    CREATE INDEX IF NOT EXISTS idx_sessions_expires ON sessions(expires_at);
  `);
}

export function createDb(sqlite: Database.Database): SessionDb {
  return drizzle(sqlite, { schema });
}

/**
 * Open (or create) the session database at `path`, apply pragmas and make
 * sure the schema exists. Pass ":memory:" for a throwaway database.
 */
export function openSessionDb(path: string): { sqlite: Database.Database; db: SessionDb } {
  const sqlite = new Database(path);
  applySqlitePragmas(sqlite);
  initSessionSchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
