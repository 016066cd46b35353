import { describe, expect, it } from "vitest";
import { parsePositions, parsePositionsJson } from "./positions-parser.js";

const callRow = {
	Underlying: "aapl",
	"Option Symbol": "AAPL  250117C00200000",
	"Put/Call": "Call",
	Strike: 200,
	Exp: "2025-01-17",
	Qty: "-2",
	"Avg Price": "3.15",
	Side: "Short",
};

describe("parsePositions", () => {
	it("maps broker rows to position inputs", () => {
		const result = parsePositions([callRow]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.positions).toEqual([
			{
				ticker: "aapl",
				type: "CALL",
				strike: 200,
				expiration: "2025-01-17",
				quantity: -2,
				optionSymbol: "AAPL  250117C00200000",
				averagePrice: 3.15,
			},
		]);
		expect(result.value.skipped).toEqual([]);
	});

	it("defaults a missing quantity to zero and omits absent extras", () => {
		const result = parsePositions([
			{ Underlying: "SPY", "Put/Call": "PUT", Strike: "450.5", Exp: "2025-03-21" },
		]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.positions).toEqual([
			{ ticker: "SPY", type: "PUT", strike: 450.5, expiration: "2025-03-21", quantity: 0 },
		]);
	});

	it("skips rows that are not options or lack an underlying", () => {
		const result = parsePositions([
			{ ...callRow, "Put/Call": "STOCK" },
			{ ...callRow, Underlying: "   " },
			callRow,
			"not a row",
		]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.positions).toHaveLength(1);
		expect(result.value.skipped.map((s) => s.row)).toEqual([1, 2, 4]);
		expect(result.value.skipped[0]?.reason).toMatch(/^Put\/Call: /);
		expect(result.value.skipped[1]?.reason).toBe("Underlying: missing underlying");
	});

	it("skips a row whose strike is not a number", () => {
		const result = parsePositions([{ ...callRow, Strike: "n/a" }]);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.positions).toEqual([]);
		expect(result.value.skipped[0]?.reason).toMatch(/^Strike: /);
	});

	it("rejects an empty document", () => {
		const result = parsePositions([]);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.describe()).toBe("Positions document contains no positions");
	});

	it("rejects a document that is not an array", () => {
		expect(parsePositions({ positions: [] }).ok).toBe(false);
	});
});

describe("parsePositionsJson", () => {
	it("parses JSON text", () => {
		const result = parsePositionsJson(JSON.stringify([callRow]));
		expect(result.ok && result.value.positions.length).toBe(1);
	});

	it("reports malformed JSON", () => {
		const result = parsePositionsJson("[{");

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.message).toBe("Positions document is not valid JSON");
	});
});
