/**
 * MemoryAlertStore: in-process alert ledger for tests and dry runs.
 *
 * Records live in a Map keyed by (ticker, date, window) and expire against the
 * injected clock. Not persisted across restarts.
 */

import { type AlertStateStore, recordKey } from "../alerts/alert-state-store.js";
import { type AlertRecord, AlertWindow } from "../alerts/types.js";
import type { Ticker } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";

export class MemoryAlertStore implements AlertStateStore {
	private readonly records = new Map<string, AlertRecord>();
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
	}

	async get(
		ticker: Ticker,
		date: string,
		window: AlertWindow = AlertWindow.Session,
	): Promise<AlertRecord | null> {
		const key = recordKey(ticker, date, window);
		const record = this.records.get(key);
		if (!record) return null;
		if (record.expiresAt <= this.clock.now()) {
			this.records.delete(key);
			return null;
		}
		return record;
	}

	async put(
		ticker: Ticker,
		date: string,
		percent: number,
		ttlMs: number,
		window: AlertWindow = AlertWindow.Session,
	): Promise<AlertRecord> {
		const previous = await this.get(ticker, date, window);
		const now = this.clock.now();
		const record: AlertRecord = {
			ticker,
			date,
			window,
			lastAlertedPercent: percent,
			alertCount: (previous?.alertCount ?? 0) + 1,
			alertedAt: now,
			expiresAt: now + ttlMs,
		};
		this.records.set(recordKey(ticker, date, window), record);
		return record;
	}

	/** Drops every expired record; returns how many went. */
	purgeExpired(): number {
		const now = this.clock.now();
		let purged = 0;
		for (const [key, record] of this.records) {
			if (record.expiresAt <= now) {
				this.records.delete(key);
				purged++;
			}
		}
		return purged;
	}

	/** Snapshot of the stored records, expired ones included. */
	entries(): AlertRecord[] {
		return [...this.records.values()];
	}

	clear(): void {
		this.records.clear();
	}

	get size(): number {
		return this.records.size;
	}
}
