import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { ticker } from "../shared/identifiers.js";
import { validateSnapshot } from "./data-validator.js";

const field = fc.oneof(
	fc.constant(null),
	fc.constant(0),
	fc.double({ min: -1_000, max: -0.01, noNaN: true }),
	fc.double({ min: 0.01, max: 100_000, noNaN: true }),
);

describe("validateSnapshot (property-based)", () => {
	it("accepts an equity iff price, previous close and volume are all positive", () => {
		fc.assert(
			fc.property(field, field, field, (currentPrice, previousClose, volume) => {
				const result = validateSnapshot({
					ticker: ticker("MSFT"),
					kind: "equity",
					currentPrice,
					previousClose,
					volume,
					priceSource: "minute",
					fetchedAt: 0,
				});
				const positive = (v: number | null): boolean => v !== null && v > 0;
				const expected = positive(currentPrice) && positive(previousClose) && positive(volume);

				expect(result.ok).toBe(expected);
				if (!result.ok) {
					const failed = [
						...(positive(currentPrice) ? [] : ["currentPrice"]),
						...(positive(previousClose) ? [] : ["previousClose"]),
						...(positive(volume) ? [] : ["volume"]),
					];
					expect(result.error.fields).toEqual(failed);
				}
			}),
		);
	});
});
