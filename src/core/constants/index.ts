/**
 * Application constants
 */

// Database constants
export const DB_CONSTANTS = {
  DEFAULT_PATH: "state/prices.sqlite",
  JOURNAL_MODE: "WAL",
  SYNCHRONOUS: "NORMAL",
  MEMORY_PATH: ":memory:",
} as const;

// Fetch constants
export const FETCH_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/111.0.0.0 Safari/537.36",
  ACCEPT_HEADER: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
  DEFAULT_TIMEOUT_MS: 10000,
} as const;

// Extraction constants (product page layout)
export const EXTRACTION_CONSTANTS = {
  TITLE_SELECTOR: "h1.ui-pdp-title",
  PRICE_FRACTION_SELECTOR: "span.andes-money-amount__fraction",
  ORIGINAL_PRICE_SELECTOR: ".andes-price__original-value",
  THOUSANDS_SEPARATOR: ".",
  DECIMAL_SEPARATOR: ",",
  MIN_PRICE_NODES: 2,
} as const;

// Polling constants
export const POLL_CONSTANTS = {
  DEFAULT_INTERVAL_SECONDS: 300,
  MIN_INTERVAL_SECONDS: 1,
} as const;

// Notification constants
export const NOTIFY_CONSTANTS = {
  TELEGRAM_API_BASE: "https://api.telegram.org",
  PARSE_MODE: "Markdown",
  CURRENCY_SYMBOL: "R$",
  TIMEOUT_MS: 10000,
} as const;
