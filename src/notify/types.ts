/**
 * Notification contracts between the alert run and delivery channels.
 */

import type { AlertEvent } from "../alerts/types.js";
import type { Ticker } from "../shared/identifiers.js";

/** One delivery target: chat webhook, SMS gateway, log sink. */
export interface AlertChannel {
	/** Stable name used in outcomes and logs. */
	readonly name: string;
	/** Resolves once delivered; rejects on failure. */
	send(event: AlertEvent): Promise<void>;
}

export interface ChannelOutcome {
	readonly channel: string;
	readonly ok: boolean;
	readonly error?: string;
}

/** Per-channel result of delivering one alert. */
export interface DispatchOutcome {
	readonly ticker: Ticker;
	readonly channels: readonly ChannelOutcome[];
}

/** Consumes alert events. Implementations never throw. */
export interface NotificationDispatcher {
	dispatch(event: AlertEvent): Promise<DispatchOutcome>;
}
