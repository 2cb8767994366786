/**
 * Append-only price history store
 */

import type { PriceHistory, PriceObservation } from "../types";
import { Logger } from "../utils/logger";
import { validateObservation } from "../validation/observation-validator";
import { closeDb, type DbHandles, openDb } from "./connection";
import { getMaxPrice, insertObservation } from "./operations";
import { initSchema } from "./schema";

export interface PriceStore {
  ensureSchema(): void;
  /** Appends one row; a null observation is logged and ignored */
  insert(observation: PriceObservation | null): void;
  maxPrice(productName: string): PriceHistory | null;
  close(): void;
}

export class SqlitePriceStore implements PriceStore {
  constructor(private readonly handles: DbHandles) {}

  /** Opens the database file and makes sure the schema exists */
  static open(dbPath: string): SqlitePriceStore {
    const store = new SqlitePriceStore(openDb(dbPath));
    store.ensureSchema();
    return store;
  }

  ensureSchema(): void {
    initSchema(this.handles.db);
  }

  insert(observation: PriceObservation | null): void {
    if (!observation) {
      Logger.warn("No observation to save");
      return;
    }
    insertObservation(this.handles.db, validateObservation(observation));
  }

  maxPrice(productName: string): PriceHistory | null {
    return getMaxPrice(this.handles.db, productName);
  }

  close(): void {
    closeDb(this.handles);
  }
}
