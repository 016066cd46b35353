/**
 * Ticker identifiers: branded strings for compile-time safety.
 *
 * A Ticker is always normalized for the market-data provider, so a raw broker
 * symbol cannot be passed where a provider symbol is expected.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Normalized underlying symbol (upper-case, trimmed, `/` replaced by `.`). */
export type Ticker = Brand<string, "Ticker">;

/** Prefix the broker uses for index underlyings (e.g. `$SPX`). */
export const INDEX_TICKER_PREFIX = "$";

/** Prefix the provider uses for index symbols (e.g. `I:SPX`). */
export const PROVIDER_INDEX_PREFIX = "I:";

/**
 * Normalize a broker symbol into a provider Ticker.
 * @throws Error if the symbol is empty after trimming
 * @example ticker(" brk/b ") // "BRK.B"
 */
export function ticker(value: string): Ticker {
	const normalized = value.trim().toUpperCase().replaceAll("/", ".");
	if (normalized.length === 0) {
		throw new Error("Ticker cannot be empty");
	}
	return normalized as Ticker;
}

/** Normalize a symbol, returning null instead of throwing when it is empty. */
export function tryTicker(value: string): Ticker | null {
	const normalized = value.trim();
	return normalized.length === 0 ? null : ticker(normalized);
}

/** True for index underlyings, which are fetched through the indices endpoint. */
export function isIndexTicker(t: Ticker): boolean {
	return t.startsWith(INDEX_TICKER_PREFIX) && t.length > INDEX_TICKER_PREFIX.length;
}

/** Provider symbol for an index ticker: `$SPX` → `I:SPX`. Equities pass through. */
export function providerSymbol(t: Ticker): string {
	return isIndexTicker(t) ? `${PROVIDER_INDEX_PREFIX}${t.slice(INDEX_TICKER_PREFIX.length)}` : t;
}
