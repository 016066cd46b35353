/**
 * Alert domain types.
 */

import type { Direction, WatchedDirection } from "../shared/direction.js";
import type { StoreError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import type { Position } from "../position/types.js";

/** Sampling window a movement is measured over. Each keeps its own ledger entry. */
export const AlertWindow = {
	/** Previous close to current price. */
	Session: "session",
	/** Consecutive minute bars. */
	Minute: "minute",
	/** Consecutive second bars. */
	Second: "second",
} as const;

export type AlertWindow = (typeof AlertWindow)[keyof typeof AlertWindow];

export const AlertKind = {
	Initial: "initial",
	Incremental: "incremental",
	/** Alerted again after the retrigger cooldown. */
	Retrigger: "retrigger",
} as const;

export type AlertKind = (typeof AlertKind)[keyof typeof AlertKind];

/** Dedup ledger entry for (ticker, calendar date, window). */
export interface AlertRecord {
	readonly ticker: Ticker;
	/** Market calendar date, `YYYY-MM-DD`. */
	readonly date: string;
	readonly window: AlertWindow;
	/** Signed percent change at the last alert. */
	readonly lastAlertedPercent: number;
	/** Alerts sent for this key, initial included. */
	readonly alertCount: number;
	readonly alertedAt: number;
	readonly expiresAt: number;
}

/** A measured price movement. */
export interface MovementResult {
	readonly ticker: Ticker;
	readonly window: AlertWindow;
	readonly percentChange: number;
	readonly direction: Direction;
	/** Bars spanned, for intraday windows. */
	readonly bars?: number;
}

/** One alert decision, handed to the dispatcher. */
export interface AlertEvent {
	readonly ticker: Ticker;
	readonly date: string;
	readonly kind: AlertKind;
	readonly window: AlertWindow;
	readonly direction: WatchedDirection;
	readonly percentChange: number;
	/** Last alerted percent, for incremental and retrigger alerts. */
	readonly previousAlertedPercent?: number;
	readonly currentPrice: number;
	readonly previousClose: number;
	readonly volume: number | null;
	readonly averageVolume?: number;
	readonly volumeRatio: number | null;
	/** Bars spanned, for intraday windows. */
	readonly bars?: number;
	readonly alertCount: number;
	/** Every held position that profits from this direction. */
	readonly positions: readonly Position[];
	readonly reason: string;
	/** The ledger could not be read; this alert may be a duplicate. */
	readonly storeDegraded: boolean;
	readonly decidedAt: number;
}

/** Why a threshold crossing did not produce an alert. */
export type SuppressionReason = "below-step" | "store-unavailable";

export interface Suppression {
	readonly ticker: Ticker;
	readonly window: AlertWindow;
	readonly direction: WatchedDirection;
	readonly percentChange: number;
	readonly reason: SuppressionReason;
	readonly lastAlertedPercent?: number;
}

/** Everything the engine decided for one ticker. */
export interface TickerEvaluation {
	readonly ticker: Ticker;
	readonly movements: readonly MovementResult[];
	readonly alerts: readonly AlertEvent[];
	readonly suppressed: readonly Suppression[];
	readonly storeErrors: readonly StoreError[];
}
