/**
 * PositionIndex: immutable map from normalized ticker to the positions held.
 *
 * Built once per run. Ticker order follows first appearance in the input so
 * fetch order and run summaries are stable.
 */

import {
	OptionType,
	type WatchedDirection,
	directionFor,
} from "../shared/direction.js";
import { type Ticker, tryTicker } from "../shared/identifiers.js";
import type { Position, PositionInput } from "./types.js";

function dedupKey(position: Position): string {
	return `${position.ticker}|${position.strike}|${position.expiration}|${position.type}`;
}

export class PositionIndex {
	private readonly byTicker: ReadonlyMap<Ticker, readonly Position[]>;
	/** Rows dropped because an identical (ticker, strike, expiration, type) was already held. */
	readonly duplicatesDropped: number;
	/** Rows dropped because their ticker was empty. */
	readonly invalidDropped: number;

	private constructor(
		byTicker: ReadonlyMap<Ticker, readonly Position[]>,
		duplicatesDropped: number,
		invalidDropped: number,
	) {
		this.byTicker = byTicker;
		this.duplicatesDropped = duplicatesDropped;
		this.invalidDropped = invalidDropped;
	}

	/**
	 * Normalizes tickers and drops duplicate contracts.
	 * @example
	 * const index = PositionIndex.build([
	 * 	{ ticker: "brk/b", type: "CALL", strike: 450, expiration: "2025-01-17", quantity: 1 },
	 * ]);
	 * index.tickers(); // ["BRK.B"]
	 */
	static build(inputs: readonly PositionInput[]): PositionIndex {
		const byTicker = new Map<Ticker, Position[]>();
		const seen = new Set<string>();
		let duplicates = 0;
		let invalid = 0;

		for (const input of inputs) {
			const normalized = tryTicker(input.ticker);
			if (normalized === null) {
				invalid++;
				continue;
			}
			const position: Position = { ...input, ticker: normalized };
			const key = dedupKey(position);
			if (seen.has(key)) {
				duplicates++;
				continue;
			}
			seen.add(key);
			const held = byTicker.get(normalized);
			if (held) {
				held.push(position);
			} else {
				byTicker.set(normalized, [position]);
			}
		}

		return new PositionIndex(byTicker, duplicates, invalid);
	}

	static empty(): PositionIndex {
		return new PositionIndex(new Map(), 0, 0);
	}

	/** Unique tickers in first-seen order. */
	tickers(): Ticker[] {
		return [...this.byTicker.keys()];
	}

	has(ticker: Ticker): boolean {
		return this.byTicker.has(ticker);
	}

	/** Number of distinct positions held across all tickers. */
	get size(): number {
		let total = 0;
		for (const positions of this.byTicker.values()) total += positions.length;
		return total;
	}

	positionsFor(ticker: Ticker): readonly Position[] {
		return this.byTicker.get(ticker) ?? [];
	}

	/** UP when any CALL is held, DOWN when any PUT is held; UP is listed first. */
	watchedDirections(ticker: Ticker): WatchedDirection[] {
		const types = new Set(this.positionsFor(ticker).map((p) => p.type));
		const directions: WatchedDirection[] = [];
		if (types.has(OptionType.Call)) directions.push(directionFor(OptionType.Call));
		if (types.has(OptionType.Put)) directions.push(directionFor(OptionType.Put));
		return directions;
	}

	/** Every position on `ticker` that profits from a move in `direction`. */
	matching(ticker: Ticker, direction: WatchedDirection): Position[] {
		return this.positionsFor(ticker).filter((p) => directionFor(p.type) === direction);
	}
}
