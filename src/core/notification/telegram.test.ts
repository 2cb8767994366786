import { beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../utils/logger";
import { TelegramNotifier } from "./telegram";

vi.mock("../utils/logger", () => ({
  Logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

function notifierWith(fetchImpl: typeof fetch) {
  return new TelegramNotifier({
    token: "test-token",
    chatId: "12345",
    apiBaseUrl: "https://api.telegram.org/",
    currencySymbol: "R$",
    fetchImpl,
  });
}

describe("TelegramNotifier", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("posts a Markdown message to the configured chat", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse({ ok: true }));

    const sent = await notifierWith(fetchImpl).notify({
      productName: "Crib X",
      currentPrice: 100,
      installmentPrice: 90,
      maxPrice: null,
    });

    expect(sent).toBe(true);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "12345",
      parse_mode: "Markdown",
      text: [
        "📊 *Price monitor*",
        "",
        "Product: *Crib X*",
        "Current price: R$ 100",
        "Installment/promotional price: R$ 90",
        "This is the first price record.",
      ].join("\n"),
    });
  });

  it("returns false and logs when Telegram rejects the request", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ ok: false, description: "Unauthorized" }, 401),
    );

    const sent = await notifierWith(fetchImpl).notify({
      productName: "Crib X",
      currentPrice: 100,
    });

    expect(sent).toBe(false);
    expect(Logger.error).toHaveBeenCalledWith(
      "Error sending Telegram message",
      expect.objectContaining({ message: "Telegram responded 401: Unauthorized" }),
      { productName: "Crib X" },
    );
  });

  it("returns false when the transport fails", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    const sent = await notifierWith(fetchImpl).notify({
      productName: "Crib X",
      currentPrice: 100,
    });

    expect(sent).toBe(false);
    expect(Logger.error).toHaveBeenCalledTimes(1);
  });

  it("returns false when the body reports ok: false despite a 200", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ ok: false, description: "chat not found" }),
    );

    await expect(
      notifierWith(fetchImpl).notify({ productName: "Crib X", currentPrice: 100 }),
    ).resolves.toBe(false);
  });
});
