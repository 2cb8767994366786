/**
 * Price observation types
 */

/** One extracted price record for one product at one point in time */
export interface PriceObservation {
  productName: string;
  oldPrice: number; // 0 when the page shows no original price
  newPrice: number;
  installmentPrice: number;
  timestamp: string; // "YYYY-MM-DD HH:MM:SS", local clock
}

/** Highest recorded newPrice for a product and when it was seen */
export interface PriceHistory {
  maxPrice: number;
  timestamp: string;
}

export type ExtractionFailureReason =
  | "empty-content"
  | "missing-title"
  | "insufficient-prices"
  | "invalid-price"
  | "unparseable-content";

export type ExtractionResult =
  | { ok: true; observation: PriceObservation }
  | { ok: false; reason: ExtractionFailureReason; detail: string };
