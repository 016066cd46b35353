/**
 * LogChannel: writes alerts to the structured log. Used for dry runs.
 */

import type { AlertEvent } from "../alerts/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { AlertChannel } from "./types.js";

export class LogChannel implements AlertChannel {
	readonly name: string;
	private readonly logger: Logger;

	constructor(logger: Logger, name = "log") {
		this.logger = logger;
		this.name = name;
	}

	async send(event: AlertEvent): Promise<void> {
		this.logger.info(
			{
				ticker: event.ticker,
				kind: event.kind,
				window: event.window,
				direction: event.direction,
				percentChange: event.percentChange,
				currentPrice: event.currentPrice,
				previousClose: event.previousClose,
				volumeRatio: event.volumeRatio,
				alertCount: event.alertCount,
				positions: event.positions.map(
					(p) => `${p.ticker} ${p.expiration} ${p.strike} ${p.type} x${p.quantity}`,
				),
				storeDegraded: event.storeDegraded,
			},
			event.reason,
		);
	}
}
