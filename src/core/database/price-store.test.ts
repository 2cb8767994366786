import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PriceObservation } from "../types";
import { ValidationError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { type DbHandles, openDb } from "./connection";
import { countObservations } from "./operations";
import { SqlitePriceStore } from "./price-store";

vi.mock("../utils/logger", () => ({
  Logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const observation = (
  overrides: Partial<PriceObservation> = {},
): PriceObservation => ({
  productName: "Crib X",
  oldPrice: 0,
  newPrice: 1000,
  installmentPrice: 1000,
  timestamp: "2024-01-01 10:00:00",
  ...overrides,
});

describe("SqlitePriceStore", () => {
  let handles: DbHandles;
  let store: SqlitePriceStore;

  beforeEach(() => {
    vi.clearAllMocks();
    handles = openDb(":memory:");
    store = new SqlitePriceStore(handles);
    store.ensureSchema();
  });

  afterEach(() => {
    store.close();
  });

  it("creates the schema idempotently", () => {
    expect(() => store.ensureSchema()).not.toThrow();

    const tables = handles.db
      .prepare<[], { n: number }>(
        `SELECT COUNT(*) AS n FROM sqlite_master WHERE type = 'table' AND name = 'prices'`,
      )
      .get();
    expect(tables?.n).toBe(1);
  });

  it("returns null for a product without rows", () => {
    expect(store.maxPrice("Unknown product")).toBeNull();
  });

  it("appends rows with every column", () => {
    store.insert(
      observation({ oldPrice: 120000, newPrice: 100000, installmentPrice: 95000 }),
    );

    const row = handles.db.prepare("SELECT * FROM prices").get();
    expect(row).toEqual({
      id: 1,
      product_name: "Crib X",
      old_price: 120000,
      new_price: 100000,
      installment_price: 95000,
      timestamp: "2024-01-01 10:00:00",
    });
  });

  it("tracks the latest value while prices keep rising", () => {
    const prices = [100, 200, 300];
    prices.forEach((newPrice, i) => {
      const timestamp = `2024-01-0${i + 1} 10:00:00`;
      store.insert(observation({ newPrice, timestamp }));
      expect(store.maxPrice("Crib X")).toEqual({ maxPrice: newPrice, timestamp });
    });
    expect(countObservations(handles.db, "Crib X")).toBe(3);
  });

  it("keeps the maximum when a lower price arrives later", () => {
    store.insert(observation({ newPrice: 500, timestamp: "2024-01-01 10:00:00" }));
    store.insert(observation({ newPrice: 400, timestamp: "2024-01-02 10:00:00" }));

    expect(store.maxPrice("Crib X")).toEqual({
      maxPrice: 500,
      timestamp: "2024-01-01 10:00:00",
    });
  });

  it("resolves ties to the earliest row", () => {
    store.insert(observation({ newPrice: 500, timestamp: "2024-01-01 10:00:00" }));
    store.insert(observation({ newPrice: 500, timestamp: "2024-01-05 10:00:00" }));

    expect(store.maxPrice("Crib X")?.timestamp).toBe("2024-01-01 10:00:00");
  });

  it("treats product names as exact keys", () => {
    store.insert(observation({ productName: "Crib X", newPrice: 500 }));
    store.insert(observation({ productName: "Crib X ", newPrice: 900 }));

    expect(store.maxPrice("Crib X")?.maxPrice).toBe(500);
    expect(store.maxPrice("crib x")).toBeNull();
  });

  it("ignores a null observation with a warning", () => {
    store.insert(null);

    expect(countObservations(handles.db, "Crib X")).toBe(0);
    expect(Logger.warn).toHaveBeenCalledWith("No observation to save");
  });

  it("rejects observations that break the invariants", () => {
    expect(() => store.insert(observation({ productName: "  " }))).toThrow(ValidationError);
    expect(() => store.insert(observation({ newPrice: 0 }))).toThrow(ValidationError);
    expect(() => store.insert(observation({ oldPrice: 1.5 }))).toThrow(ValidationError);
    expect(() => store.insert(observation({ timestamp: "2024-01-01T10:00:00Z" }))).toThrow(
      ValidationError,
    );
    expect(countObservations(handles.db, "Crib X")).toBe(0);
  });

  it("closes the connection", () => {
    store.close();

    expect(handles.db.open).toBe(false);
    expect(() => store.close()).not.toThrow();
  });
});
