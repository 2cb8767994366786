/**
 * Default product pages
 *
 * Used when neither PRODUCT_URLS nor PRODUCT_URLS_FILE is set.
 *
 * Usage:
 * - Environment: PRODUCT_URLS=https://...,https://...
 * - File: PRODUCT_URLS_FILE=state/urls.txt (one URL per line, # for comments)
 * - Default fallback: the list below
 */
export const DEFAULT_PRODUCT_URLS: readonly string[] = [
  "https://www.mercadolivre.com.br/carrinho-beb-conforto-moises-napoli-travel-system-galzerano-cor-preto/p/MLB24838651",
  "https://produto.mercadolivre.com.br/MLB-1231795719-berco-cama-multifuncional-com-cama-auxiliar-3-gavetas-de-_JM",
];

/**
 * Parses a URL list file: one URL per line, blank lines and "#" comments skipped
 */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((s) => s.trim())
    .filter((s) => s && !s.startsWith("#"));
}
