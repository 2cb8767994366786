/**
 * Database schema initialization
 */

import type Database from "better-sqlite3";

/**
 * Creates the price history table and its lookup index if they are missing
 * Safe to run on every start.
 * @param db - Database connection to initialize
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS prices (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      product_name TEXT,
      old_price INTEGER,
      new_price INTEGER,
      installment_price INTEGER,
      timestamp TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_prices_product_name ON prices(product_name);
  `);
}
