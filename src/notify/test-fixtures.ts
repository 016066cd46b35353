import type { AlertEvent } from "../alerts/types.js";
import { ticker } from "../shared/identifiers.js";

/** A minimal decided alert for channel and dispatcher tests. */
export function sampleAlert(overrides: Partial<AlertEvent> = {}): AlertEvent {
	const t = ticker("AAPL");
	return {
		ticker: t,
		date: "2024-03-14",
		kind: "initial",
		window: "session",
		direction: "UP",
		percentChange: 5.2,
		currentPrice: 105.2,
		previousClose: 100,
		volume: 2_000_000,
		averageVolume: 1_000_000,
		volumeRatio: 2,
		alertCount: 1,
		positions: [
			{ ticker: t, type: "CALL", strike: 190, expiration: "2024-04-19", quantity: 2 },
		],
		reason: "Move from previous close of +5.20% (UP)",
		storeDegraded: false,
		decidedAt: 0,
		...overrides,
	};
}
