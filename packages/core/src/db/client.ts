import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { sql } from 'drizzle-orm';
import * as schema from './schema.js';

export type RelayDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Create (or open) a SQLite database at `dbPath`, apply the schema via
 * inline DDL, and return a typed drizzle-orm instance.
 */
export function createDatabase(dbPath: string): RelayDatabase {
  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');

  const db = drizzle(sqlite, { schema });

  // ── Inline schema creation (idempotent) ───────────────────────────────
  db.run(sql`
    CREATE TABLE IF NOT EXISTS relay_jobs (
      correlation_id  TEXT PRIMARY KEY NOT NULL,
      origin_chat     INTEGER NOT NULL,
      attachment_kind TEXT NOT NULL,
      file_name       TEXT,
      file_size       INTEGER,
      state           TEXT NOT NULL,
      failure_kind    TEXT,
      failure_message TEXT,
      link            TEXT,
      attempt_count   INTEGER NOT NULL DEFAULT 0,
      created_at      TEXT NOT NULL,
      settled_at      TEXT NOT NULL
    )
  `);

  db.run(sql`
    CREATE INDEX IF NOT EXISTS idx_relay_jobs_settled_at
      ON relay_jobs(settled_at)
  `);

  return db;
}
