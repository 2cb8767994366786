/**
 * Database operations for the price history
 */

import type Database from "better-sqlite3";
import type {
  MaxPriceRow,
  PriceHistory,
  PriceObservation,
  PriceRow,
} from "../types";

type PriceInsertParams = Omit<PriceRow, "id">;

/**
 * Appends one observation row
 * @param db - Database connection
 * @param o - Observation to persist
 * @returns Row id of the inserted row
 */
export function insertObservation(
  db: Database.Database,
  o: PriceObservation,
): number {
  const info = db
    .prepare<PriceInsertParams>(
      `INSERT INTO prices (product_name, old_price, new_price, installment_price, timestamp)
       VALUES (@product_name, @old_price, @new_price, @installment_price, @timestamp)`,
    )
    .run({
      product_name: o.productName,
      old_price: o.oldPrice,
      new_price: o.newPrice,
      installment_price: o.installmentPrice,
      timestamp: o.timestamp,
    });
  return Number(info.lastInsertRowid);
}

/**
 * Looks up the highest recorded new_price for a product
 * Ties go to the earliest row.
 * @param db - Database connection
 * @param productName - Exact product name (no normalization)
 * @returns Highest price and its timestamp, or null when the product has no rows
 */
export function getMaxPrice(
  db: Database.Database,
  productName: string,
): PriceHistory | null {
  const row = db
    .prepare<[string], MaxPriceRow>(
      `SELECT new_price, timestamp FROM prices
       WHERE product_name = ?
       ORDER BY new_price DESC, id ASC
       LIMIT 1`,
    )
    .get(productName);
  return row ? { maxPrice: row.new_price, timestamp: row.timestamp } : null;
}

/**
 * Counts rows recorded for a product
 */
export function countObservations(
  db: Database.Database,
  productName: string,
): number {
  const row = db
    .prepare<[string], { n: number }>(
      `SELECT COUNT(*) AS n FROM prices WHERE product_name = ?`,
    )
    .get(productName);
  return row?.n ?? 0;
}
