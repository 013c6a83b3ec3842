import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import initSqlJs, { SqlJsStatic } from 'sql.js';
import { drizzle, SQLJsDatabase } from 'drizzle-orm/sql-js';
import { createLogger } from '../services/logger';
import * as schema from './schema';

const log = createLogger('Database');

export type AppDatabase = SQLJsDatabase<typeof schema>;

const DDL = `
CREATE TABLE IF NOT EXISTS sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  start_time INTEGER NOT NULL,
  end_time INTEGER,
  duration_seconds REAL,
  total_detections INTEGER NOT NULL DEFAULT 0,
  total_alerts INTEGER NOT NULL DEFAULT 0,
  critical_alerts INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS detections (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER NOT NULL REFERENCES sessions(id),
  timestamp INTEGER NOT NULL,
  object_type TEXT NOT NULL,
  distance_category TEXT NOT NULL,
  direction TEXT NOT NULL,
  size REAL NOT NULL,
  confidence REAL,
  x1 REAL,
  y1 REAL,
  x2 REAL,
  y2 REAL,
  admitted INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS alerts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER NOT NULL REFERENCES sessions(id),
  timestamp INTEGER NOT NULL,
  category TEXT NOT NULL,
  distance_category TEXT NOT NULL,
  object_type TEXT NOT NULL,
  direction TEXT,
  alert_text TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS voice_commands (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER NOT NULL REFERENCES sessions(id),
  timestamp INTEGER NOT NULL,
  command TEXT NOT NULL,
  response TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS scene_summaries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER NOT NULL REFERENCES sessions(id),
  timestamp INTEGER NOT NULL,
  summary_text TEXT NOT NULL,
  object_count INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_detections_session ON detections(session_id);
CREATE INDEX IF NOT EXISTS idx_detections_timestamp ON detections(timestamp);
CREATE INDEX IF NOT EXISTS idx_alerts_session ON alerts(session_id);
CREATE INDEX IF NOT EXISTS idx_alerts_timestamp ON alerts(timestamp);
`;

export const MEMORY_DATABASE = ':memory:';
const SAVE_INTERVAL_MS = 30_000;

export interface DatabaseHandle {
  db: AppDatabase;
  /** Writes the in-memory image to disk. No-op for ':memory:'. */
  save: () => void;
  /** Saves, then releases the database. */
  close: () => void;
}

let engine: Promise<SqlJsStatic> | null = null;
const loadEngine = () => (engine ??= initSqlJs());

/**
 * Opens (or creates) the store. The database lives in memory and is written back
 * to `path` periodically and on close. Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(path: string): Promise<DatabaseHandle> {
  const SQL = await loadEngine();
  const persistent = path !== MEMORY_DATABASE;
  const sqlite = new SQL.Database(persistent && existsSync(path) ? readFileSync(path) : undefined);
  sqlite.exec(DDL);

  const save = () => {
    if (persistent) writeFileSync(path, sqlite.export());
  };
  const timer = persistent
    ? setInterval(() => {
        try {
          save();
        } catch (error) {
          log.error(`Failed to save database to ${path}`, error);
        }
      }, SAVE_INTERVAL_MS)
    : null;
  timer?.unref();

  let closed = false;
  return {
    db: drizzle(sqlite, { schema }),
    save,
    close: () => {
      if (closed) return;
      closed = true;
      if (timer) clearInterval(timer);
      try {
        save();
      } finally {
        sqlite.close();
      }
    }
  };
}
