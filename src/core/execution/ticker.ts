/**
 * Interval source for the poll loop
 */

import { setTimeout as sleep } from "node:timers/promises";

export interface Ticker {
  /**
   * Waits for the next tick
   * @returns false when the signal aborted the wait
   */
  wait(ms: number, signal: AbortSignal): Promise<boolean>;
}

/** Wall-clock ticker; aborting the signal ends the wait early */
export const sleepTicker: Ticker = {
  async wait(ms, signal) {
    if (signal.aborted) return false;
    try {
      await sleep(ms, undefined, { signal });
      return true;
    } catch (e) {
      if (signal.aborted) return false;
      throw e;
    }
  },
};
