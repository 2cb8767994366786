/**
 * Product page price extraction
 */

import { load } from "cheerio";
import { EXTRACTION_CONSTANTS } from "../constants";
import type {
  ExtractionConfig,
  ExtractionResult,
  PriceObservation,
} from "../types";
import { formatLocalTimestamp } from "../utils/date";
import { toError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { parsePriceText } from "./price-parser";

export interface PriceExtractor {
  extract(html: string | null | undefined): ExtractionResult;
}

export interface PriceExtractorOptions extends Partial<ExtractionConfig> {
  /** Clock used for the observation timestamp */
  now?: () => Date;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  titleSelector: EXTRACTION_CONSTANTS.TITLE_SELECTOR,
  priceSelector: EXTRACTION_CONSTANTS.PRICE_FRACTION_SELECTOR,
  originalPriceSelector: EXTRACTION_CONSTANTS.ORIGINAL_PRICE_SELECTOR,
  thousandsSeparator: EXTRACTION_CONSTANTS.THOUSANDS_SEPARATOR,
  decimalSeparator: EXTRACTION_CONSTANTS.DECIMAL_SEPARATOR,
  minPriceNodes: EXTRACTION_CONSTANTS.MIN_PRICE_NODES,
};

const fail = (
  reason: Extract<ExtractionResult, { ok: false }>["reason"],
  detail: string,
): ExtractionResult => ({ ok: false, reason, detail });

/**
 * Extracts a price observation from product page HTML
 * Title, price fractions (current, then installment) and the optional original price
 * are read by selector; the observation is stamped with the given time.
 */
export function extractObservation(
  html: string | null | undefined,
  config: ExtractionConfig,
  at: Date,
): ExtractionResult {
  if (!html || !html.trim()) {
    return fail("empty-content", "Empty HTML received for parsing");
  }

  const $ = load(html);

  const productName = $(config.titleSelector).first().text().trim();
  if (!productName) {
    return fail("missing-title", `No product title at ${config.titleSelector}`);
  }

  const priceTexts = $(config.priceSelector)
    .toArray()
    .map((el) => $(el).text().trim());
  if (priceTexts.length < config.minPriceNodes) {
    return fail(
      "insufficient-prices",
      `Expected at least ${config.minPriceNodes} price nodes at ${config.priceSelector}, found ${priceTexts.length}`,
    );
  }

  const newPrice = parsePriceText(priceTexts[0], config);
  if (newPrice === null || newPrice <= 0) {
    return fail("invalid-price", `Current price "${priceTexts[0]}" is not a positive integer`);
  }

  let installmentPrice = newPrice;
  if (priceTexts.length >= 2) {
    const parsed = parsePriceText(priceTexts[1], config);
    if (parsed === null || parsed < 0) {
      return fail(
        "invalid-price",
        `Installment price "${priceTexts[1]}" is not a non-negative integer`,
      );
    }
    installmentPrice = parsed;
  }

  let oldPrice = 0;
  const original = $(config.originalPriceSelector).first();
  if (original.length > 0) {
    const text = original.text().trim();
    const parsed = parsePriceText(text, config);
    if (parsed === null || parsed < 0) {
      return fail(
        "invalid-price",
        `Original price "${text}" is not a non-negative integer`,
      );
    }
    oldPrice = parsed;
  }

  const observation: PriceObservation = {
    productName,
    oldPrice,
    newPrice,
    installmentPrice,
    timestamp: formatLocalTimestamp(at),
  };
  return { ok: true, observation };
}

/**
 * Creates an extractor that never throws and logs why a page was rejected
 */
export function createPriceExtractor(
  options: PriceExtractorOptions = {},
): PriceExtractor {
  const { now = () => new Date(), ...overrides } = options;
  const config: ExtractionConfig = {
    titleSelector: overrides.titleSelector ?? DEFAULT_EXTRACTION_CONFIG.titleSelector,
    priceSelector: overrides.priceSelector ?? DEFAULT_EXTRACTION_CONFIG.priceSelector,
    originalPriceSelector:
      overrides.originalPriceSelector ?? DEFAULT_EXTRACTION_CONFIG.originalPriceSelector,
    thousandsSeparator:
      overrides.thousandsSeparator ?? DEFAULT_EXTRACTION_CONFIG.thousandsSeparator,
    decimalSeparator:
      overrides.decimalSeparator ?? DEFAULT_EXTRACTION_CONFIG.decimalSeparator,
    minPriceNodes: overrides.minPriceNodes ?? DEFAULT_EXTRACTION_CONFIG.minPriceNodes,
  };

  return {
    extract(html) {
      let result: ExtractionResult;
      try {
        result = extractObservation(html, config, now());
      } catch (e) {
        const err = toError(e);
        Logger.error("Error parsing HTML", err, { length: html?.length ?? 0 });
        return fail("unparseable-content", err.message);
      }

      if (result.ok) return result;

      const meta = { reason: result.reason, length: html?.length ?? 0 };
      switch (result.reason) {
        case "empty-content":
          Logger.warn(result.detail, meta);
          break;
        case "insufficient-prices":
          Logger.error(
            "Price nodes missing, page layout may have changed",
            undefined,
            { ...meta, detail: result.detail },
          );
          break;
        default:
          Logger.error("Error parsing HTML", undefined, {
            ...meta,
            detail: result.detail,
          });
      }
      return result;
    },
  };
}
