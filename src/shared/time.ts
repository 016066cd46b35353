/**
 * Time utilities: injectable clock and market calendar dates.
 *
 * Code reads Clock.now() instead of Date.now() so tests can move time without
 * patching globals.
 */

/** Injectable time source. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
	days: (n: number) => n * 86_400_000,
} as const;

// ── Calendar dates ───────────────────────────────────────────────────

const dateFormatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
	const cached = dateFormatters.get(timeZone);
	if (cached) return cached;
	// en-CA renders as YYYY-MM-DD
	const formatter = new Intl.DateTimeFormat("en-CA", {
		timeZone,
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
	});
	dateFormatters.set(timeZone, formatter);
	return formatter;
}

/**
 * Calendar date (`YYYY-MM-DD`) of an instant in the given IANA time zone.
 * @throws RangeError if the time zone is unknown
 */
export function calendarDate(epochMs: number, timeZone: string): string {
	return formatterFor(timeZone).format(new Date(epochMs));
}

/** Calendar date `days` before the given `YYYY-MM-DD` date. */
export function shiftDate(date: string, days: number): string {
	const shifted = new Date(`${date}T00:00:00Z`);
	shifted.setUTCDate(shifted.getUTCDate() + days);
	return shifted.toISOString().slice(0, 10);
}

/** True when the time zone is understood by the runtime's Intl data. */
export function isValidTimeZone(timeZone: string): boolean {
	try {
		calendarDate(0, timeZone);
		return true;
	} catch {
		return false;
	}
}
