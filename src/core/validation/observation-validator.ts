/**
 * Observation validation utilities
 */

import type { PriceObservation } from "../types";
import { LOCAL_TIMESTAMP_RE } from "../utils/date";
import { ValidationError } from "../utils/errors";

const isWholeNumber = (n: number) => Number.isSafeInteger(n) && n >= 0;

/**
 * Validates an observation before it is persisted
 * @param o - The observation to validate
 * @returns The same observation
 * @throws ValidationError if an invariant does not hold
 */
export function validateObservation(o: PriceObservation): PriceObservation {
  if (!o.productName.trim()) {
    throw new ValidationError("Product name must not be blank", "productName");
  }
  if (!Number.isSafeInteger(o.newPrice) || o.newPrice <= 0) {
    throw new ValidationError(
      "Current price must be a positive integer",
      "newPrice",
    );
  }
  if (!isWholeNumber(o.oldPrice)) {
    throw new ValidationError(
      "Original price must be a non-negative integer",
      "oldPrice",
    );
  }
  if (!isWholeNumber(o.installmentPrice)) {
    throw new ValidationError(
      "Installment price must be a non-negative integer",
      "installmentPrice",
    );
  }
  if (!LOCAL_TIMESTAMP_RE.test(o.timestamp)) {
    throw new ValidationError(
      "Timestamp must use YYYY-MM-DD HH:MM:SS",
      "timestamp",
    );
  }
  return o;
}
