/**
 * Position domain types.
 */

import type { OptionType } from "../shared/direction.js";
import type { Ticker } from "../shared/identifiers.js";

/** An option position as supplied by the loader, before ticker normalization. */
export interface PositionInput {
	readonly ticker: string;
	readonly type: OptionType;
	readonly strike: number;
	/** Contract expiration, `YYYY-MM-DD`. */
	readonly expiration: string;
	/** Signed contract count; negative for short positions. */
	readonly quantity: number;
	readonly optionSymbol?: string;
	readonly averagePrice?: number;
}

/** A position held in the index; its ticker is normalized for the provider. */
export interface Position extends Omit<PositionInput, "ticker"> {
	readonly ticker: Ticker;
}

/** A broker row that did not produce a position. */
export interface SkippedRow {
	/** 1-based row number in the source document. */
	readonly row: number;
	readonly reason: string;
}

/** Outcome of parsing a positions export. */
export interface ParsedPositions {
	readonly positions: readonly PositionInput[];
	readonly skipped: readonly SkippedRow[];
}
