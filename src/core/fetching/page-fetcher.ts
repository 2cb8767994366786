/**
 * HTTP page fetching with browser-like headers
 */

import { FETCH_CONSTANTS } from "../constants";
import type { FetchConfig } from "../types";
import { FetchError, toError } from "../utils/errors";
import { Logger } from "../utils/logger";

export type FetchImpl = typeof fetch;

export interface PageFetcher {
  /** Returns the page body, or null when the request failed */
  fetchPage(url: string): Promise<string | null>;
}

export interface PageFetcherOptions extends Partial<FetchConfig> {
  fetchImpl?: FetchImpl;
}

/**
 * Fetches text content from a URL once
 * @throws FetchError on timeout, network failure or non-2xx status
 */
export async function fetchTextOnce(
  url: string,
  options: PageFetcherOptions = {},
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? FETCH_CONSTANTS.DEFAULT_TIMEOUT_MS;

  let r: Response;
  try {
    r = await fetchImpl(url, {
      redirect: "follow",
      headers: {
        "user-agent": options.userAgent ?? FETCH_CONSTANTS.USER_AGENT,
        accept: FETCH_CONSTANTS.ACCEPT_HEADER,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    const err = toError(e);
    const message =
      err.name === "TimeoutError"
        ? `Timed out after ${timeoutMs}ms for ${url}`
        : `${err.message} for ${url}`;
    throw new FetchError(message, url);
  }
  if (!r.ok) {
    // release the connection instead of leaving the body to GC
    await r.body?.cancel();
    throw new FetchError(`HTTP ${r.status} for ${url}`, url, r.status);
  }
  return r.text();
}

/**
 * Creates a fetcher that logs transport failures and reports them as null
 */
export function createPageFetcher(
  options: PageFetcherOptions = {},
): PageFetcher {
  return {
    async fetchPage(url: string): Promise<string | null> {
      try {
        return await fetchTextOnce(url, options);
      } catch (e) {
        Logger.fetchFailed(url, toError(e));
        return null;
      }
    },
  };
}
