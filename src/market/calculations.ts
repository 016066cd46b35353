/**
 * Price arithmetic shared by the fetcher and the alert engine.
 */

import { Decimal } from "../lib/decimal/index.js";
import type { PriceSource } from "../shared/config.js";
import type { Bar, PriceCandidates, PriceFallback } from "./types.js";

const HUNDRED = Decimal.from(100);

/**
 * `(current − previous) / previous × 100`, exact.
 * @throws RangeError if previous is not positive
 */
export function percentChange(current: number, previous: number): Decimal {
	if (!(previous > 0)) {
		throw new RangeError(`Invalid previous price: ${previous}`);
	}
	const prev = Decimal.from(previous);
	return Decimal.from(current).sub(prev).div(prev).mul(HUNDRED);
}

/** Current volume over average volume, or null without a usable average. */
export function volumeRatio(volume: number | null, averageVolume: number | undefined): number | null {
	if (volume === null || averageVolume === undefined || !(averageVolume > 0)) return null;
	return volume / averageVolume;
}

/** Mean of the strictly positive bar volumes, or null when there are none. */
export function averageVolume(bars: readonly Bar[]): number | null {
	const volumes = bars.map((b) => b.volume).filter((v) => v > 0);
	if (volumes.length === 0) return null;
	return volumes.reduce((sum, v) => sum + v, 0) / volumes.length;
}

/**
 * Percent change of each bar's close from the previous bar's close. Pairs
 * with a non-positive close are skipped.
 */
export function barChanges(bars: readonly Bar[]): Decimal[] {
	const changes: Decimal[] = [];
	for (let i = 1; i < bars.length; i++) {
		const prev = bars[i - 1];
		const cur = bars[i];
		if (!prev || !cur || !(prev.close > 0) || !(cur.close > 0)) continue;
		changes.push(percentChange(cur.close, prev.close));
	}
	return changes;
}

export interface SelectedPrice {
	readonly price: number;
	readonly source: PriceSource;
	readonly fallback?: PriceFallback;
}

/**
 * First strictly positive candidate in precedence order. Using any source
 * other than the first is reported as a fallback.
 */
export function selectPrice(
	candidates: PriceCandidates,
	precedence: readonly PriceSource[],
): SelectedPrice | null {
	const preferred = precedence[0];
	for (const source of precedence) {
		const price = candidates[source];
		if (price === undefined || !(price > 0)) continue;
		if (preferred === undefined || source === preferred) {
			return { price, source };
		}
		return { price, source, fallback: { from: preferred, to: source } };
	}
	return null;
}
