import { describe, expect, it } from "vitest";
import { averageVolume, barChanges, percentChange, selectPrice, volumeRatio } from "./calculations.js";
import type { Bar } from "./types.js";

function bars(closes: readonly number[], volumes: readonly number[] = []): Bar[] {
	return closes.map((close, i) => ({ close, volume: volumes[i] ?? 0, timestamp: i * 60_000 }));
}

describe("percentChange", () => {
	it("is exact at threshold boundaries", () => {
		expect(percentChange(104.9, 100).toString()).toBe("4.9");
		expect(percentChange(105, 100).toString()).toBe("5");
		expect(percentChange(110, 100).toString()).toBe("10");
		expect(percentChange(95, 100).toString()).toBe("-5");
	});

	it("is zero without movement", () => {
		expect(percentChange(42.5, 42.5).isZero()).toBe(true);
	});

	it("rejects a non-positive previous price", () => {
		expect(() => percentChange(10, 0)).toThrow("Invalid previous price: 0");
		expect(() => percentChange(10, -1)).toThrow(RangeError);
	});
});

describe("volumeRatio", () => {
	it("divides volume by the average", () => {
		expect(volumeRatio(500, 250)).toBe(2);
	});

	it("is null without volume or a positive average", () => {
		expect(volumeRatio(null, 250)).toBeNull();
		expect(volumeRatio(500, undefined)).toBeNull();
		expect(volumeRatio(500, 0)).toBeNull();
	});
});

describe("averageVolume", () => {
	it("averages only positive volumes", () => {
		expect(averageVolume(bars([1, 1, 1], [100, 0, 300]))).toBe(200);
	});

	it("is null when no bar traded", () => {
		expect(averageVolume(bars([1, 1], [0, 0]))).toBeNull();
		expect(averageVolume([])).toBeNull();
	});
});

describe("barChanges", () => {
	it("computes close-to-close changes and skips zero closes", () => {
		const changes = barChanges(bars([100, 102, 0, 100, 99]));
		expect(changes.map((c) => c.toString())).toEqual(["2", "-1"]);
	});

	it("is empty for fewer than two bars", () => {
		expect(barChanges(bars([100]))).toEqual([]);
	});
});

describe("selectPrice", () => {
	const precedence = ["minute", "quote", "day"] as const;

	it("uses the first source without recording a fallback", () => {
		expect(selectPrice({ minute: 101, quote: 100, day: 99 }, precedence)).toEqual({
			price: 101,
			source: "minute",
		});
	});

	it("records a fallback when the preferred source is empty", () => {
		expect(selectPrice({ minute: 0, quote: 100.25, day: 99 }, precedence)).toEqual({
			price: 100.25,
			source: "quote",
			fallback: { from: "minute", to: "quote" },
		});
	});

	it("ignores sources outside the precedence", () => {
		expect(selectPrice({ trade: 100 }, precedence)).toBeNull();
	});

	it("returns null when every source is empty", () => {
		expect(selectPrice({}, precedence)).toBeNull();
	});
});
