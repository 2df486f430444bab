import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  script_path TEXT,
  script_content TEXT,
  inventory TEXT NOT NULL,
  target TEXT NOT NULL,
  run_at TEXT NOT NULL,
  is_generated INTEGER NOT NULL DEFAULT 0,
  safety_validated INTEGER NOT NULL DEFAULT 0,
  generation_metadata TEXT,
  validation_errors TEXT NOT NULL DEFAULT '[]',
  status TEXT NOT NULL,
  job_id TEXT,
  output TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks (status);
CREATE INDEX IF NOT EXISTS idx_tasks_job_id ON tasks (job_id);

CREATE TABLE IF NOT EXISTS templates (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  body TEXT NOT NULL,
  variables_schema TEXT NOT NULL,
  created_at TEXT NOT NULL,
  deleted INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_templates_name ON templates (name);
`;

/**
 * Open (creating if needed) the SQLite database and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): Db {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.exec(SCHEMA);
  return db;
}
