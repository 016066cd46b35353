import { describe, expect, it } from "vitest";
import { AlertError } from "../../shared/errors.js";
import { SchemaValidationError, validate, z } from "./index.js";

const quoteSchema = z.object({
	ticker: z.string().min(1),
	last: z.object({
		price: z.number().positive(),
		size: z.number().int().optional(),
	}),
});

describe("validate()", () => {
	it("returns the parsed value for a matching payload", () => {
		const result = validate(quoteSchema, { ticker: "AAPL", last: { price: 190.5 } });

		expect(result).toEqual({ ok: true, value: { ticker: "AAPL", last: { price: 190.5 } } });
	});

	it("returns the coerced output, not the input", () => {
		const result = validate(z.coerce.number(), "42.5");

		expect(result).toEqual({ ok: true, value: 42.5 });
	});

	it("collects one issue per invalid field with its path", () => {
		const result = validate(quoteSchema, { ticker: "", last: { price: "190" } });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(SchemaValidationError);
			expect(result.error.issues.map((i) => i.path)).toEqual([["ticker"], ["last", "price"]]);
		}
	});

	it("reports a missing nested object at its own path", () => {
		const result = validate(quoteSchema, { ticker: "AAPL" });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.issues).toEqual([{ path: ["last"], message: "Required" }]);
		}
	});
});

describe("SchemaValidationError", () => {
	it("is a non-retryable AlertError", () => {
		const error = new SchemaValidationError("Validation failed", [
			{ path: ["day", "c"], message: "bad" },
		]);

		expect(error).toBeInstanceOf(AlertError);
		expect(error.code).toBe("SCHEMA_INVALID");
		expect(error.category).toBe("non_retryable");
		expect(error.isRetryable).toBe(false);
		expect(error.name).toBe("SchemaValidationError");
	});

	it("describes the first issue as path and message", () => {
		const error = new SchemaValidationError("Validation failed", [
			{ path: ["results", 0, "c"], message: "Expected number, received string" },
			{ path: ["status"], message: "Required" },
		]);

		expect(error.describe()).toBe("results.0.c: Expected number, received string");
	});

	it("describes a root issue by its message alone", () => {
		const error = new SchemaValidationError("Validation failed", [
			{ path: [], message: "Expected array, received object" },
		]);

		expect(error.describe()).toBe("Expected array, received object");
	});

	it("falls back to its own message without issues", () => {
		expect(new SchemaValidationError("Validation failed", []).describe()).toBe("Validation failed");
	});
});
