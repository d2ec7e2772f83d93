import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema/index.js';

export type TodoDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    due_date TEXT NOT NULL,
    is_done INTEGER NOT NULL DEFAULT 0,
    done_at TEXT,
    created_at TEXT NOT NULL,
    is_recurring INTEGER NOT NULL DEFAULT 0,
    display_order INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
CREATE INDEX IF NOT EXISTS idx_tasks_done_created ON tasks(is_done, created_at);
CREATE INDEX IF NOT EXISTS idx_tasks_open_title_due ON tasks(title, due_date) WHERE is_done = 0;
`;

/**
 * Open a Drizzle database connection with pragmas and schema applied.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string): TodoDb {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent: every statement uses IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): TodoDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (transactions, pragmas, raw exec).
 */
export function getRawDb(db: TodoDb): Database.Database {
  return db.$client;
}

export function closeDb(db: TodoDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
