/**
 * FanoutDispatcher: delivers each alert to every registered channel.
 *
 * Channels run concurrently and independently: one channel failing or
 * throwing never stops the others, and `dispatch` itself never rejects.
 */

import type { AlertEvent } from "../alerts/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { DispatchError } from "../shared/errors.js";
import type {
	AlertChannel,
	ChannelOutcome,
	DispatchOutcome,
	NotificationDispatcher,
} from "./types.js";

export class FanoutDispatcher implements NotificationDispatcher {
	private readonly channels: AlertChannel[] = [];
	private readonly logger: Logger;

	constructor(channels: readonly AlertChannel[] = [], logger: Logger = silentLogger) {
		this.logger = logger;
		for (const channel of channels) this.register(channel);
	}

	/**
	 * Adds a channel. Returns an unsubscribe function.
	 * @throws Error if a channel with the same name is already registered
	 */
	register(channel: AlertChannel): () => void {
		if (this.channels.some((c) => c.name === channel.name)) {
			throw new Error(`Channel "${channel.name}" is already registered`);
		}
		this.channels.push(channel);
		return () => {
			const idx = this.channels.indexOf(channel);
			if (idx !== -1) this.channels.splice(idx, 1);
		};
	}

	get channelNames(): string[] {
		return this.channels.map((c) => c.name);
	}

	async dispatch(event: AlertEvent): Promise<DispatchOutcome> {
		const channels = [...this.channels];
		const settled = await Promise.allSettled(channels.map((c) => this.sendVia(c, event)));

		const outcomes: ChannelOutcome[] = settled.map((result, i) => {
			const name = channels[i]?.name ?? "unknown";
			if (result.status === "fulfilled") return { channel: name, ok: true };
			const error =
				result.reason instanceof DispatchError
					? result.reason
					: new DispatchError(`Channel ${name} failed: ${String(result.reason)}`, name);
			this.logger.warn(
				{ ticker: event.ticker, channel: name, err: error.message },
				"Alert delivery failed",
			);
			return { channel: name, ok: false, error: error.message };
		});

		return { ticker: event.ticker, channels: outcomes };
	}

	// a synchronous throw inside send() becomes a rejection here
	private async sendVia(channel: AlertChannel, event: AlertEvent): Promise<void> {
		try {
			await channel.send(event);
		} catch (error: unknown) {
			const msg = error instanceof Error ? error.message : String(error);
			throw new DispatchError(`Channel ${channel.name} failed: ${msg}`, channel.name, {
				ticker: event.ticker,
				cause: error,
			});
		}
	}
}
