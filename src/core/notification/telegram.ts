/**
 * Telegram Bot API notifier
 */

import { NOTIFY_CONSTANTS } from "../constants";
import type { TelegramConfig } from "../types";
import { toError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { formatPriceMessage, type PriceNotification } from "./message";

export interface Notifier {
  /** Sends one status message; resolves false when delivery failed */
  notify(notification: PriceNotification): Promise<boolean>;
}

export interface TelegramNotifierOptions extends TelegramConfig {
  currencySymbol?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface TelegramResponse {
  ok?: boolean;
  description?: string;
}

function readTelegramResponse(value: unknown): TelegramResponse {
  if (typeof value !== "object" || value === null) return {};
  return {
    ok: "ok" in value && typeof value.ok === "boolean" ? value.ok : undefined,
    description:
      "description" in value && typeof value.description === "string"
        ? value.description
        : undefined,
  };
}

export class TelegramNotifier implements Notifier {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  private get endpoint(): string {
    const base = this.options.apiBaseUrl.replace(/\/+$/, "");
    return `${base}/bot${this.options.token}/sendMessage`;
  }

  async notify(notification: PriceNotification): Promise<boolean> {
    const text = formatPriceMessage(
      notification,
      this.options.currencySymbol ?? NOTIFY_CONSTANTS.CURRENCY_SYMBOL,
    );
    try {
      const r = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          chat_id: this.options.chatId,
          text,
          parse_mode: NOTIFY_CONSTANTS.PARSE_MODE,
        }),
        signal: AbortSignal.timeout(
          this.options.timeoutMs ?? NOTIFY_CONSTANTS.TIMEOUT_MS,
        ),
      });
      const body = readTelegramResponse(await r.json().catch(() => null));
      if (!r.ok || body.ok === false) {
        throw new Error(
          `Telegram responded ${r.status}: ${body.description ?? r.statusText}`,
        );
      }
      Logger.debug("Notification sent", {
        productName: notification.productName,
      });
      return true;
    } catch (e) {
      Logger.error("Error sending Telegram message", toError(e), {
        productName: notification.productName,
      });
      return false;
    }
  }
}
