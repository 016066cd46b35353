/**
 * Direction: price movement and position bias semantics.
 *
 * A CALL benefits from the underlying rising, a PUT from it falling, so each
 * option type watches exactly one movement direction.
 */

/** Sign of a price movement. */
export const Direction = {
	Up: "UP",
	Down: "DOWN",
	Flat: "FLAT",
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

/** The two directions an alert can be raised for. */
export type WatchedDirection = typeof Direction.Up | typeof Direction.Down;

/** Option contract types carried in a positions export. */
export const OptionType = {
	Call: "CALL",
	Put: "PUT",
} as const;

export type OptionType = (typeof OptionType)[keyof typeof OptionType];

/** Direction of movement an option type profits from. */
export function directionFor(type: OptionType): WatchedDirection {
	return type === OptionType.Call ? Direction.Up : Direction.Down;
}

/** Direction of a signed percent change; exactly zero is FLAT. */
export function directionOf(percent: number): Direction {
	if (percent > 0) return Direction.Up;
	if (percent < 0) return Direction.Down;
	return Direction.Flat;
}
