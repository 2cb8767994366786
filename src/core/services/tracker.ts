/**
 * Tracker Service - wires configuration into a poll loop
 * Used by the long-running entry point and the CLI
 */

import { type PriceStore, SqlitePriceStore } from "../database/price-store";
import { PollLoop } from "../execution/poll-loop";
import type { Ticker } from "../execution/ticker";
import {
  createPriceExtractor,
  type PriceExtractor,
} from "../extraction/price-extractor";
import { createPageFetcher, type PageFetcher } from "../fetching/page-fetcher";
import { type Notifier, TelegramNotifier } from "../notification/telegram";
import type { AppConfig, ExtractionResult } from "../types";

export interface TrackerOverrides {
  fetcher?: PageFetcher;
  extractor?: PriceExtractor;
  store?: PriceStore;
  notifier?: Notifier;
  urls?: readonly string[];
  ticker?: Ticker;
}

export function createFetcher(config: AppConfig): PageFetcher {
  return createPageFetcher(config.fetch);
}

export function createExtractor(config: AppConfig): PriceExtractor {
  return createPriceExtractor(config.extraction);
}

/**
 * Builds the poll loop and its collaborators; the store is opened here
 * and owned by the returned loop
 */
export function createTracker(
  config: AppConfig,
  overrides: TrackerOverrides = {},
): PollLoop {
  return new PollLoop({
    fetcher: overrides.fetcher ?? createFetcher(config),
    extractor: overrides.extractor ?? createExtractor(config),
    store: overrides.store ?? SqlitePriceStore.open(config.dbPath),
    notifier:
      overrides.notifier ??
      new TelegramNotifier({
        ...config.telegram,
        currencySymbol: config.currencySymbol,
      }),
    urls: overrides.urls ?? config.productUrls,
    intervalMs: config.pollIntervalSeconds * 1000,
    ticker: overrides.ticker,
  });
}

export interface CheckResult {
  url: string;
  result: ExtractionResult;
}

/**
 * Fetches and extracts each URL without notifying or persisting
 */
export async function checkUrls(
  urls: readonly string[],
  fetcher: PageFetcher,
  extractor: PriceExtractor,
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const url of urls) {
    const html = await fetcher.fetchPage(url);
    results.push({ url, result: extractor.extract(html) });
  }
  return results;
}
