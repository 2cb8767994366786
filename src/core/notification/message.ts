/**
 * Price status message formatting (Telegram legacy Markdown)
 */

export interface PriceNotification {
  productName: string;
  currentPrice: number;
  installmentPrice?: number | null;
  maxPrice?: number | null;
  maxPriceTimestamp?: string | null;
}

/** Escapes the characters legacy Markdown treats as markup */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, "\\$1");
}

/**
 * Builds the status message for one observation
 * The last line compares the current price with the recorded maximum.
 */
export function formatPriceMessage(
  n: PriceNotification,
  currencySymbol: string,
): string {
  const money = (v: number) => `${currencySymbol} ${v}`;
  const lines = [
    "📊 *Price monitor*",
    "",
    `Product: *${escapeMarkdown(n.productName)}*`,
    `Current price: ${money(n.currentPrice)}`,
  ];
  if (n.installmentPrice != null) {
    lines.push(`Installment/promotional price: ${money(n.installmentPrice)}`);
  }

  if (n.maxPrice == null) {
    lines.push("This is the first price record.");
  } else if (n.currentPrice > n.maxPrice) {
    lines.push("New high price recorded!");
  } else {
    lines.push(
      `Highest recorded price: ${money(n.maxPrice)} on ${n.maxPriceTimestamp ?? "unknown date"}`,
    );
  }
  return lines.join("\n");
}
