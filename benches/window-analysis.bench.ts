import { bench, describe } from "vitest";
import {
	MINUTE_WINDOW_SIZES,
	secondWindowRules,
	strongestCrossing,
	strongestMove,
} from "../src/alerts/window-analysis.js";
import { barChanges } from "../src/market/calculations.js";
import type { Bar } from "../src/market/types.js";
import { DEFAULT_ALERT_CONFIG } from "../src/shared/config.js";
import { Direction } from "../src/shared/direction.js";

function generateBars(n: number): Bar[] {
	const bars: Bar[] = [];
	let price = 180;
	for (let i = 0; i < n; i++) {
		price = Math.max(1, price + (Math.random() - 0.5) * 2);
		bars.push({ timestamp: i * 60_000, close: Number(price.toFixed(2)), volume: 1_000 });
	}
	return bars;
}

const minuteChanges = barChanges(generateBars(30));
const secondChanges = barChanges(generateBars(300));
const SECOND_RULES = secondWindowRules(DEFAULT_ALERT_CONFIG);

describe("intraday windows", () => {
	bench("minute windows over 30 bars", () => {
		strongestMove(minuteChanges, MINUTE_WINDOW_SIZES, Direction.Up);
	});

	bench("second windows over 300 bars", () => {
		strongestCrossing(secondChanges, SECOND_RULES, Direction.Down);
	});
});
