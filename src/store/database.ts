import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getLogger } from "../util/logger.js";

const log = getLogger("database");

/**
 * Open (or create) the diary database and bring the schema up to date.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  migrate(db);

  log.info({ path }, "database opened");
  return db;
}

function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      builder_name TEXT NOT NULL,
      start_date TEXT NOT NULL,
      status TEXT NOT NULL,
      description TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS entries (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id),
      date TEXT NOT NULL,
      weather TEXT,
      temperature REAL,
      content TEXT NOT NULL,
      workers_count INTEGER,
      materials TEXT,
      work_hours REAL,
      costs REAL,
      notes TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_entries_project_date ON entries(project_id, date);

    CREATE TABLE IF NOT EXISTS photos (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      project_id INTEGER NOT NULL REFERENCES projects(id),
      filename TEXT NOT NULL UNIQUE,
      original_filename TEXT NOT NULL,
      description TEXT,
      date_taken TEXT NOT NULL,
      file_size INTEGER NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_photos_project_date ON photos(project_id, date_taken);
  `);
}
