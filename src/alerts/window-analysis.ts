/**
 * Intraday window analysis: the strongest run of consecutive bar changes.
 *
 * A window's move is the sum of its consecutive bar-to-bar percent changes.
 * Among all windows of the given sizes, the strongest move in the watched
 * direction wins: largest magnitude first, then the wider window.
 */

import { Decimal } from "../lib/decimal/index.js";
import type { AlertMonitorConfig } from "../shared/config.js";
import { Direction, type WatchedDirection } from "../shared/direction.js";

/** Minute windows span 2 to 10 consecutive changes. */
export const MINUTE_WINDOW_SIZES: readonly number[] = [2, 3, 4, 5, 6, 7, 8, 9, 10];

export const SECOND_WINDOW_SIZES: readonly number[] = [5, 10, 15];

/** A window size and the absolute percent its move must reach. */
export interface WindowRule {
	readonly size: number;
	readonly thresholdPercent: number;
}

export interface WindowMove {
	/** Consecutive changes summed. */
	readonly bars: number;
	readonly percentChange: Decimal;
	/** Offset of the first change in the series. */
	readonly startIndex: number;
}

/** Every minute window shares one threshold. */
export function minuteWindowRules(
	settings: Pick<AlertMonitorConfig, "minuteWindowThresholdPercent">,
): WindowRule[] {
	return MINUTE_WINDOW_SIZES.map((size) => ({
		size,
		thresholdPercent: settings.minuteWindowThresholdPercent,
	}));
}

/** Longer second windows need a larger move. */
export function secondWindowRules(
	settings: Pick<
		AlertMonitorConfig,
		"fiveSecondThresholdPercent" | "tenSecondThresholdPercent" | "fifteenSecondThresholdPercent"
	>,
): WindowRule[] {
	return [
		{ size: 5, thresholdPercent: settings.fiveSecondThresholdPercent },
		{ size: 10, thresholdPercent: settings.tenSecondThresholdPercent },
		{ size: 15, thresholdPercent: settings.fifteenSecondThresholdPercent },
	];
}

function stronger(candidate: WindowMove, best: WindowMove | null): boolean {
	if (best === null) return true;
	const c = candidate.percentChange.abs().cmp(best.percentChange.abs());
	return c > 0 || (c === 0 && candidate.bars > best.bars);
}

/** Moves of every `size`-change window pointing in `direction`. */
function windowMoves(
	changes: readonly Decimal[],
	size: number,
	direction: WatchedDirection,
): WindowMove[] {
	const moves: WindowMove[] = [];
	if (size < 1 || size > changes.length) return moves;
	for (let start = 0; start + size <= changes.length; start++) {
		let sum = Decimal.zero();
		for (const change of changes.slice(start, start + size)) {
			sum = sum.add(change);
		}
		const pointsRight = direction === Direction.Up ? sum.isPositive() : sum.isNegative();
		if (!pointsRight || sum.isZero()) continue;
		moves.push({ bars: size, percentChange: sum, startIndex: start });
	}
	return moves;
}

/**
 * Strongest window move pointing in `direction`, or null when no window of
 * the given sizes fits the series or none moves that way.
 */
export function strongestMove(
	changes: readonly Decimal[],
	sizes: readonly number[],
	direction: WatchedDirection,
): WindowMove | null {
	let best: WindowMove | null = null;
	for (const size of sizes) {
		for (const move of windowMoves(changes, size, direction)) {
			if (stronger(move, best)) best = move;
		}
	}
	return best;
}

/**
 * Strongest move among the windows that reach their own rule's threshold.
 * A wide window that beats a narrow one but misses its larger threshold
 * never shadows the narrow window's crossing.
 */
export function strongestCrossing(
	changes: readonly Decimal[],
	rules: readonly WindowRule[],
	direction: WatchedDirection,
): WindowMove | null {
	let best: WindowMove | null = null;
	for (const rule of rules) {
		const threshold = Decimal.from(rule.thresholdPercent);
		for (const move of windowMoves(changes, rule.size, direction)) {
			if (move.percentChange.abs().cmp(threshold) < 0) continue;
			if (stronger(move, best)) best = move;
		}
	}
	return best;
}
