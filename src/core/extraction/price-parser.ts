/**
 * Price text parsing
 */

export interface PriceFormat {
  thousandsSeparator: string;
  decimalSeparator: string;
}

/**
 * Parses displayed price text into a whole-unit integer
 * Accepts "1.299", "R$ 1.299" and "1.299,90" (fraction dropped) with the default format
 * @param input - Raw node text
 * @param format - Separator convention of the page
 * @returns Integer price, or null when the text is not a number
 */
export function parsePriceText(
  input: string | null | undefined,
  format: PriceFormat,
): number | null {
  if (!input) return null;
  // Drop whitespace (incl. nbsp) and a leading currency label
  let s = input.replace(/\s+/g, "").replace(/^[^\d-]+/, "");
  if (format.decimalSeparator) {
    const i = s.indexOf(format.decimalSeparator);
    if (i >= 0) s = s.slice(0, i);
  }
  if (format.thousandsSeparator) {
    s = s.split(format.thousandsSeparator).join("");
  }
  if (!/^-?\d+$/.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}
