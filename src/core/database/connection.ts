/**
 * Database connection management
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { DB_CONSTANTS } from "../constants";
import type { DbHandles } from "../types";

export type { DbHandles };

/**
 * Opens a database connection with WAL settings
 * Schema creation is left to the caller (see initSchema)
 * @param dbPath - Path to the SQLite database file, or ":memory:"
 * @returns Database handles object containing the connection
 */
export function openDb(dbPath: string): DbHandles {
  if (dbPath === DB_CONSTANTS.MEMORY_PATH) {
    return { db: new Database(dbPath) };
  }
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma(`journal_mode = ${DB_CONSTANTS.JOURNAL_MODE}`);
  db.pragma(`synchronous = ${DB_CONSTANTS.SYNCHRONOUS}`);
  return { db };
}

/**
 * Closes a database connection
 * @param h - Database handles to close
 */
export function closeDb(h: DbHandles): void {
  if (h.db.open) h.db.close();
}
