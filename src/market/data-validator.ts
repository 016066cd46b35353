/**
 * DataValidator: gatekeeper between the fetcher and the alert engine.
 *
 * A snapshot is valid only when current price, previous close and volume are
 * all strictly positive. Indices publish no volume and are exempt from that
 * one field.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type RequiredSnapshotField, ValidationRejectedError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { InstrumentKind, type RawSnapshot, type Snapshot } from "./types.js";

function isPositive(value: number | null): value is number {
	return value !== null && Number.isFinite(value) && value > 0;
}

/**
 * Checks the required fields of a raw snapshot.
 * @returns the snapshot, or a rejection naming every failed field
 */
export function validateSnapshot(raw: RawSnapshot): Result<Snapshot, ValidationRejectedError> {
	const failed: RequiredSnapshotField[] = [];
	const { currentPrice, previousClose, volume } = raw;
	if (!isPositive(currentPrice)) failed.push("currentPrice");
	if (!isPositive(previousClose)) failed.push("previousClose");
	if (raw.kind !== InstrumentKind.Index && !isPositive(volume)) failed.push("volume");

	if (!isPositive(currentPrice) || !isPositive(previousClose) || failed.length > 0) {
		return err(new ValidationRejectedError(raw.ticker, failed));
	}
	return ok({ ...raw, currentPrice, previousClose, volume: isPositive(volume) ? volume : null });
}

export class DataValidator {
	private readonly logger: Logger;

	constructor(logger: Logger = silentLogger) {
		this.logger = logger;
	}

	/** Validates one snapshot, logging a rejection. */
	validate(raw: RawSnapshot): Result<Snapshot, ValidationRejectedError> {
		const result = validateSnapshot(raw);
		if (!result.ok) {
			this.logger.info(
				{ ticker: raw.ticker, fields: result.error.fields },
				"Snapshot rejected",
			);
		}
		return result;
	}
}
