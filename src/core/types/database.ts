/**
 * Database-related types
 */

import type Database from "better-sqlite3";

export interface DbHandles {
  db: Database.Database;
}

export interface PriceRow {
  id: number;
  product_name: string;
  old_price: number;
  new_price: number;
  installment_price: number;
  timestamp: string;
}

export type MaxPriceRow = Pick<PriceRow, "new_price" | "timestamp">;
