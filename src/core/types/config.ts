/**
 * Configuration-related types
 */

/** Minimum number of price nodes a page must show */
export type MinPriceNodes = 1 | 2;

export interface ExtractionConfig {
  titleSelector: string;
  priceSelector: string;
  originalPriceSelector: string;
  thousandsSeparator: string;
  decimalSeparator: string;
  minPriceNodes: MinPriceNodes;
}

export interface FetchConfig {
  userAgent: string;
  timeoutMs: number;
}

export interface TelegramConfig {
  token: string;
  chatId: string;
  apiBaseUrl: string;
}

export interface AppConfig {
  productUrls: string[];
  pollIntervalSeconds: number;
  dbPath: string;
  currencySymbol: string;
  healthPort: number | null;
  fetch: FetchConfig;
  extraction: ExtractionConfig;
  telegram: TelegramConfig;
}
