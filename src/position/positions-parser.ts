/**
 * Positions parser: turns a broker positions export (JSON array of rows) into
 * PositionInputs.
 *
 * Rows that are not options, or lack an underlying, strike or expiration, are
 * skipped and reported with their row number. A document that is not a
 * non-empty array is an error.
 */

import { SchemaValidationError, validate, z } from "../lib/validation/index.js";
import { OptionType } from "../shared/direction.js";
import { type Result, err, ok } from "../shared/result.js";
import type { ParsedPositions, PositionInput, SkippedRow } from "./types.js";

const numeric = z
	.union([z.number(), z.string().trim().min(1)])
	.pipe(z.coerce.number().finite());

const brokerRowSchema = z.object({
	Underlying: z.string().trim().min(1, "missing underlying"),
	"Put/Call": z
		.string()
		.trim()
		.toUpperCase()
		.pipe(z.enum([OptionType.Call, OptionType.Put])),
	Strike: numeric,
	Exp: z.string().trim().min(1, "missing expiration"),
	Qty: numeric.optional(),
	"Option Symbol": z.string().trim().optional(),
	"Avg Price": numeric.optional(),
});

const documentSchema = z.array(z.unknown()).min(1, "Positions document contains no positions");

type BrokerRow = z.output<typeof brokerRowSchema>;

function toInput(row: BrokerRow): PositionInput {
	const optionSymbol = row["Option Symbol"];
	const averagePrice = row["Avg Price"];
	return {
		ticker: row.Underlying,
		type: row["Put/Call"],
		strike: row.Strike,
		expiration: row.Exp,
		quantity: row.Qty ?? 0,
		...(optionSymbol ? { optionSymbol } : {}),
		...(averagePrice !== undefined ? { averagePrice } : {}),
	};
}

/** Parses an already-decoded positions document. */
export function parsePositions(document: unknown): Result<ParsedPositions, SchemaValidationError> {
	const rows = validate(documentSchema, document);
	if (!rows.ok) return rows;

	const positions: PositionInput[] = [];
	const skipped: SkippedRow[] = [];
	rows.value.forEach((raw, i) => {
		const parsed = validate(brokerRowSchema, raw);
		if (parsed.ok) {
			positions.push(toInput(parsed.value));
		} else {
			skipped.push({ row: i + 1, reason: parsed.error.describe() });
		}
	});

	return ok({ positions, skipped });
}

/** Parses a positions export from its JSON text. */
export function parsePositionsJson(text: string): Result<ParsedPositions, SchemaValidationError> {
	let document: unknown;
	try {
		document = JSON.parse(text);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(
			new SchemaValidationError("Positions document is not valid JSON", [{ path: [], message }]),
		);
	}
	return parsePositions(document);
}
