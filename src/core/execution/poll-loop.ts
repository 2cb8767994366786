/**
 * Poll loop: fetch → extract → compare → notify → persist, for every URL, every interval
 */

import { performance } from "node:perf_hooks";
import type { PriceStore } from "../database/price-store";
import type { PriceExtractor } from "../extraction/price-extractor";
import type { PageFetcher } from "../fetching/page-fetcher";
import type { Notifier } from "../notification/telegram";
import { formatDuration } from "../utils/date";
import { toError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { sleepTicker, type Ticker } from "./ticker";

export type LoopState = "running" | "stopped";

export type UrlOutcome = "recorded" | "skipped" | "failed";

export interface PollLoopDeps {
  fetcher: PageFetcher;
  extractor: PriceExtractor;
  store: PriceStore;
  notifier: Notifier;
  urls: readonly string[];
  intervalMs: number;
  ticker?: Ticker;
}

export interface CycleSummary {
  cycle: number;
  urls: number;
  recorded: number;
  skipped: number;
  failed: number;
  notified: number;
  /** True when the signal stopped the cycle before every URL was visited */
  interrupted: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Stop after this many cycles (default: run until aborted) */
  maxCycles?: number;
}

export class PollLoop {
  private _state: LoopState = "running";
  private cycle = 0;
  private readonly ticker: Ticker;

  constructor(private readonly deps: PollLoopDeps) {
    this.ticker = deps.ticker ?? sleepTicker;
  }

  get state(): LoopState {
    return this._state;
  }

  /** Runs one URL through the pipeline; failures stay inside this URL */
  async processUrl(url: string): Promise<{ outcome: UrlOutcome; notified: boolean }> {
    const { fetcher, extractor, store, notifier } = this.deps;
    let productName: string | undefined;
    let notified = false;
    try {
      const html = await fetcher.fetchPage(url);
      const result = extractor.extract(html);
      if (!result.ok) return { outcome: "skipped", notified: false };

      const o = result.observation;
      productName = o.productName;
      const history = store.maxPrice(o.productName);

      try {
        notified = await notifier.notify({
          productName: o.productName,
          currentPrice: o.newPrice,
          installmentPrice: o.installmentPrice,
          maxPrice: history?.maxPrice ?? null,
          maxPriceTimestamp: history?.timestamp ?? null,
        });
      } catch (e) {
        Logger.error("Notification failed", toError(e), { url, productName });
      }

      store.insert(o);
      Logger.observationRecorded(url, o.productName, o.newPrice);
      return { outcome: "recorded", notified };
    } catch (e) {
      Logger.error(`Failed to record price: ${url}`, toError(e), {
        url,
        productName,
      });
      return { outcome: "failed", notified };
    }
  }

  /** One pass over the configured URLs, in order */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const t0 = performance.now();
    const summary: CycleSummary = {
      cycle: ++this.cycle,
      urls: this.deps.urls.length,
      recorded: 0,
      skipped: 0,
      failed: 0,
      notified: 0,
      interrupted: false,
    };

    for (const url of this.deps.urls) {
      if (signal?.aborted) {
        summary.interrupted = true;
        break;
      }
      const { outcome, notified } = await this.processUrl(url);
      summary[outcome]++;
      if (notified) summary.notified++;
    }

    Logger.cycleComplete(
      summary.cycle,
      summary.recorded,
      summary.urls,
      formatDuration((performance.now() - t0) / 1000),
    );
    return summary;
  }

  /**
   * Runs cycles until the signal aborts (or maxCycles is reached), then closes the store
   * @returns Number of cycles started
   */
  async run(options: RunOptions = {}): Promise<number> {
    if (this._state === "stopped") {
      throw new Error("Poll loop has already stopped");
    }
    const signal = options.signal ?? new AbortController().signal;
    const maxCycles = options.maxCycles ?? Infinity;

    Logger.info("Price monitoring started", {
      count: this.deps.urls.length,
      intervalMs: this.deps.intervalMs,
    });

    let cycles = 0;
    try {
      while (!signal.aborted && cycles < maxCycles) {
        await this.runCycle(signal);
        cycles++;
        if (cycles >= maxCycles) break;
        if (!(await this.ticker.wait(this.deps.intervalMs, signal))) break;
      }
    } finally {
      this._state = "stopped";
      this.deps.store.close();
      Logger.info("Execution stopped", { cycles });
    }
    return cycles;
  }
}
