/**
 * Centralized application configuration
 */

import fs from "node:fs";
import {
  DB_CONSTANTS,
  EXTRACTION_CONSTANTS,
  FETCH_CONSTANTS,
  NOTIFY_CONSTANTS,
  POLL_CONSTANTS,
} from "../constants";
import type { AppConfig, MinPriceNodes } from "../types";
import { ConfigError } from "../utils/errors";
import { sanitizeUrl } from "../validation/url";
import { type Env, envInt, envList, envStr } from "./env";
import { DEFAULT_PRODUCT_URLS, parseUrlList } from "./products";

export interface LoadConfigOptions {
  /** Reads PRODUCT_URLS_FILE (default: fs.readFileSync as utf8) */
  readText?: (path: string) => string;
  /** Demand TELEGRAM_TOKEN and TELEGRAM_CHAT_ID (default: true); off for dry runs */
  requireTelegram?: boolean;
}

const REQUIRED_KEYS = ["TELEGRAM_TOKEN", "TELEGRAM_CHAT_ID"] as const;

function resolveProductUrls(env: Env, readText: (p: string) => string) {
  const file = envStr("PRODUCT_URLS_FILE", "", env);
  let raw: string[];
  if (file) {
    try {
      raw = parseUrlList(readText(file));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Could not read PRODUCT_URLS_FILE=${file}: ${reason}`, [
        "PRODUCT_URLS_FILE",
      ]);
    }
  } else {
    raw = envList("PRODUCT_URLS", [...DEFAULT_PRODUCT_URLS], env);
  }

  const urls: string[] = [];
  for (const u of raw) {
    const clean = sanitizeUrl(u);
    if (!clean) {
      throw new ConfigError(`Invalid product URL: ${u}`, ["PRODUCT_URLS"]);
    }
    urls.push(clean);
  }
  if (urls.length === 0) {
    throw new ConfigError("No product URLs configured", ["PRODUCT_URLS"]);
  }
  return urls;
}

function resolveMinPriceNodes(env: Env): MinPriceNodes {
  const n = envInt("MIN_PRICE_NODES", EXTRACTION_CONSTANTS.MIN_PRICE_NODES, env);
  if (n === 1 || n === 2) return n;
  throw new ConfigError(`MIN_PRICE_NODES must be 1 or 2, got ${n}`, [
    "MIN_PRICE_NODES",
  ]);
}

/**
 * Builds the application configuration from environment variables
 * @param env - Environment to read (default: process.env)
 * @throws ConfigError when required variables are missing or values are invalid
 */
export function loadAppConfig(
  env: Env = process.env,
  options: LoadConfigOptions = {},
): AppConfig {
  const requireTelegram = options.requireTelegram ?? true;
  const missing: string[] = requireTelegram
    ? REQUIRED_KEYS.filter((k) => !env[k]?.trim())
    : [];
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      [...missing],
    );
  }

  const readText =
    options.readText ?? ((p: string) => fs.readFileSync(p, "utf8"));

  const pollIntervalSeconds = envInt(
    "POLL_INTERVAL_SECONDS",
    POLL_CONSTANTS.DEFAULT_INTERVAL_SECONDS,
    env,
  );
  if (pollIntervalSeconds < POLL_CONSTANTS.MIN_INTERVAL_SECONDS) {
    throw new ConfigError(
      `POLL_INTERVAL_SECONDS must be at least ${POLL_CONSTANTS.MIN_INTERVAL_SECONDS}`,
      ["POLL_INTERVAL_SECONDS"],
    );
  }

  const healthPort = envInt("HEALTH_PORT", 0, env);

  return {
    productUrls: resolveProductUrls(env, readText),
    pollIntervalSeconds,
    dbPath: envStr("DB_PATH", DB_CONSTANTS.DEFAULT_PATH, env),
    currencySymbol: envStr(
      "CURRENCY_SYMBOL",
      NOTIFY_CONSTANTS.CURRENCY_SYMBOL,
      env,
    ),
    healthPort: healthPort > 0 ? healthPort : null,
    fetch: {
      userAgent: envStr("USER_AGENT", FETCH_CONSTANTS.USER_AGENT, env),
      timeoutMs: Math.max(
        1,
        envInt("FETCH_TIMEOUT_MS", FETCH_CONSTANTS.DEFAULT_TIMEOUT_MS, env),
      ),
    },
    extraction: {
      titleSelector: EXTRACTION_CONSTANTS.TITLE_SELECTOR,
      priceSelector: EXTRACTION_CONSTANTS.PRICE_FRACTION_SELECTOR,
      originalPriceSelector: EXTRACTION_CONSTANTS.ORIGINAL_PRICE_SELECTOR,
      thousandsSeparator: envStr(
        "PRICE_THOUSANDS_SEPARATOR",
        EXTRACTION_CONSTANTS.THOUSANDS_SEPARATOR,
        env,
      ),
      decimalSeparator: envStr(
        "PRICE_DECIMAL_SEPARATOR",
        EXTRACTION_CONSTANTS.DECIMAL_SEPARATOR,
        env,
      ),
      minPriceNodes: resolveMinPriceNodes(env),
    },
    telegram: {
      token: envStr("TELEGRAM_TOKEN", "", env),
      chatId: envStr("TELEGRAM_CHAT_ID", "", env),
      apiBaseUrl: envStr(
        "TELEGRAM_API_BASE",
        NOTIFY_CONSTANTS.TELEGRAM_API_BASE,
        env,
      ),
    },
  };
}
