import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/index.js';
import { StoreUnavailableError } from '../core/errors.js';
import { getLogger } from '../utils/logging.js';

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS incidents (
  identity TEXT PRIMARY KEY,
  occurred_at TEXT NOT NULL,
  description TEXT NOT NULL,
  notified_at TEXT NOT NULL,
  run_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_incidents_notified_at ON incidents(notified_at);
`;

let db: Database.Database | undefined;
let dbUrl: string | undefined;

/** Accepts `file:<path>`, a plain path, or `:memory:`. */
export function resolveDatabasePath(url: string): string {
  const match = /^file:(.*)$/.exec(url);
  const target = match ? match[1] : url;
  if (target === ':memory:') return target;
  return path.isAbsolute(target) ? target : path.resolve(process.cwd(), target);
}

export function openDatabase(url: string): Database.Database {
  const dbPath = resolveDatabasePath(url);
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const conn = new Database(dbPath);
    conn.pragma('journal_mode = WAL');
    conn.pragma('synchronous = NORMAL');
    conn.exec(SCHEMA_DDL);
    getLogger().debug({ db: dbPath }, 'incident store opened');
    return conn;
  } catch (err) {
    throw new StoreUnavailableError(`Cannot open incident store at ${dbPath}`, err);
  }
}

/** Process-wide connection; reopened when asked for a different store. */
export function getDatabase(url = loadConfig().database.url): Database.Database {
  if (db && dbUrl !== url) {
    closeDatabase();
  }
  if (!db) {
    db = openDatabase(url);
    dbUrl = url;
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = undefined;
    dbUrl = undefined;
  }
}
