import { beforeEach, describe, expect, it, vi } from "vitest";
import { FETCH_CONSTANTS } from "../constants";
import { FetchError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { createPageFetcher, fetchTextOnce } from "./page-fetcher";

vi.mock("../utils/logger", () => ({
  Logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fetchFailed: vi.fn(),
  },
}));

const URL_A = "https://shop.example/p/1";

const timeoutError = () =>
  Object.assign(new Error("The operation was aborted due to timeout"), {
    name: "TimeoutError",
  });

describe("fetchTextOnce", () => {
  it("sends a browser user agent and returns the body", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("<html>ok</html>"));

    await expect(fetchTextOnce(URL_A, { fetchImpl })).resolves.toBe("<html>ok</html>");

    const init = fetchImpl.mock.calls[0][1];
    expect(new Headers(init?.headers).get("user-agent")).toBe(FETCH_CONSTANTS.USER_AGENT);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("uses a configured user agent", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(""));

    await fetchTextOnce(URL_A, { fetchImpl, userAgent: "test-agent" });

    const init = fetchImpl.mock.calls[0][1];
    expect(new Headers(init?.headers).get("user-agent")).toBe("test-agent");
  });

  it("throws a FetchError carrying the status for non-2xx responses", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response("unavailable", { status: 503 }),
    );

    const err = await fetchTextOnce(URL_A, { fetchImpl }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({
      message: `HTTP 503 for ${URL_A}`,
      url: URL_A,
      status: 503,
    });
  });

  it("cancels the body of a non-2xx response", async () => {
    const response = new Response("<html>not found</html>", { status: 404 });
    const body = response.body;
    if (!body) throw new Error("response has no body");
    const cancel = vi.spyOn(body, "cancel");

    await expect(
      fetchTextOnce(URL_A, { fetchImpl: async () => response }),
    ).rejects.toThrow(`HTTP 404 for ${URL_A}`);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("describes timeouts", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw timeoutError();
    });

    await expect(fetchTextOnce(URL_A, { fetchImpl, timeoutMs: 250 })).rejects.toThrow(
      `Timed out after 250ms for ${URL_A}`,
    );
  });
});

describe("createPageFetcher", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns the page body", async () => {
    const fetcher = createPageFetcher({
      fetchImpl: async () => new Response("<h1>hi</h1>"),
    });

    await expect(fetcher.fetchPage(URL_A)).resolves.toBe("<h1>hi</h1>");
    expect(Logger.fetchFailed).not.toHaveBeenCalled();
  });

  it("logs and returns null on a 404", async () => {
    const fetcher = createPageFetcher({
      fetchImpl: async () => new Response("", { status: 404 }),
    });

    await expect(fetcher.fetchPage(URL_A)).resolves.toBeNull();
    expect(Logger.fetchFailed).toHaveBeenCalledWith(
      URL_A,
      expect.objectContaining({ message: `HTTP 404 for ${URL_A}` }),
    );
  });

  it("logs and returns null on DNS failure", async () => {
    const fetcher = createPageFetcher({
      fetchImpl: async () => {
        throw new TypeError("getaddrinfo ENOTFOUND shop.example");
      },
    });

    await expect(fetcher.fetchPage(URL_A)).resolves.toBeNull();
    expect(Logger.fetchFailed).toHaveBeenCalledWith(
      URL_A,
      expect.objectContaining({
        message: `getaddrinfo ENOTFOUND shop.example for ${URL_A}`,
      }),
    );
  });

  it("logs and returns null on timeout", async () => {
    const fetcher = createPageFetcher({
      fetchImpl: async () => {
        throw timeoutError();
      },
    });

    await expect(fetcher.fetchPage(URL_A)).resolves.toBeNull();
    expect(Logger.fetchFailed).toHaveBeenCalledTimes(1);
  });
});
