/**
 * Market data domain types.
 */

import type { PriceSource } from "../shared/config.js";
import type { Ticker } from "../shared/identifiers.js";

/** Equities come from the stocks snapshot endpoint, indices from the indices endpoint. */
export const InstrumentKind = {
	Equity: "equity",
	Index: "index",
} as const;

export type InstrumentKind = (typeof InstrumentKind)[keyof typeof InstrumentKind];

/** One aggregate bar, in chronological order when held in an array. */
export interface Bar {
	readonly close: number;
	readonly volume: number;
	/** Bar start, epoch ms. */
	readonly timestamp: number;
}

/** Latest price per provider source; absent or zero means the source had nothing. */
export type PriceCandidates = Partial<Record<PriceSource, number>>;

/** Provider reading before any price source is chosen. */
export interface ProviderQuote {
	readonly ticker: Ticker;
	readonly kind: InstrumentKind;
	readonly candidates: PriceCandidates;
	readonly previousClose: number | null;
	readonly volume: number | null;
}

/** A later source stood in for the preferred one. */
export interface PriceFallback {
	readonly from: PriceSource;
	readonly to: PriceSource;
}

/** Fetcher output; fields may still be missing or zero. */
export interface RawSnapshot {
	readonly ticker: Ticker;
	readonly kind: InstrumentKind;
	readonly currentPrice: number | null;
	readonly previousClose: number | null;
	readonly volume: number | null;
	readonly priceSource: PriceSource | null;
	readonly priceFallback?: PriceFallback;
	readonly averageVolume?: number;
	readonly minuteBars?: readonly Bar[];
	readonly secondBars?: readonly Bar[];
	readonly fetchedAt: number;
}

/**
 * A snapshot that passed validation: prices are strictly positive, and so is
 * volume for equities. Indices carry no volume.
 */
export interface Snapshot {
	readonly ticker: Ticker;
	readonly kind: InstrumentKind;
	readonly currentPrice: number;
	readonly previousClose: number;
	readonly volume: number | null;
	readonly priceSource: PriceSource | null;
	readonly priceFallback?: PriceFallback;
	readonly averageVolume?: number;
	readonly minuteBars?: readonly Bar[];
	readonly secondBars?: readonly Bar[];
	readonly fetchedAt: number;
}

export interface RequestOptions {
	readonly signal?: AbortSignal;
}

/** Intraday bar resolution. */
export type IntradayTimespan = "minute" | "second";
