/**
 * AlertStateStore: the dedup ledger the engine reads and writes.
 *
 * Implementations must return a record written by `put` to the next `get`
 * for the same key in the same process, and must stop returning a record
 * once its TTL has passed. Expiry is the store's job, never the engine's.
 */

import type { Ticker } from "../shared/identifiers.js";
import type { AlertRecord, AlertWindow } from "./types.js";

export interface AlertStateStore {
	/** The live record for the key, or null when none exists or it expired. */
	get(ticker: Ticker, date: string, window?: AlertWindow): Promise<AlertRecord | null>;

	/**
	 * Creates the record for the key or advances it to `percent`, bumping its
	 * alert count and resetting its expiry to now + `ttlMs`.
	 */
	put(
		ticker: Ticker,
		date: string,
		percent: number,
		ttlMs: number,
		window?: AlertWindow,
	): Promise<AlertRecord>;
}

/** Map key shared by the store adapters. */
export function recordKey(ticker: Ticker, date: string, window: AlertWindow): string {
	return `${ticker}|${date}|${window}`;
}
