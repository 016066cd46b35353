/**
 * Run-level types: options, summary and observable events.
 */

import type { AlertEvent, Suppression } from "../alerts/types.js";
import type { RawSnapshot } from "../market/types.js";
import type { DispatchOutcome } from "../notify/types.js";
import type { FetchError, StoreError, ValidationRejectedError } from "../shared/errors.js";

export interface RunOptions {
	/** Epoch ms after which no new fetch starts. */
	readonly deadline?: number;
	readonly signal?: AbortSignal;
}

/** Structured partial-success report of one run. */
export interface RunSummary {
	readonly positionsChecked: number;
	readonly uniqueTickers: number;
	readonly duplicatesDropped: number;
	readonly invalidPositionsDropped: number;
	readonly snapshotsFetched: number;
	readonly snapshotsRejected: number;
	readonly alerts: {
		readonly initial: number;
		readonly incremental: number;
		readonly retrigger: number;
		readonly total: number;
	};
	readonly suppressed: number;
	readonly dispatch: {
		/** Channel deliveries that succeeded. */
		readonly sent: number;
		readonly failed: number;
	};
	readonly errors: {
		readonly count: number;
		readonly messages: readonly string[];
	};
	readonly alertEvents: readonly AlertEvent[];
	/** The deadline passed or the run was aborted before every fetch finished. */
	readonly timedOut: boolean;
	readonly startedAt: number;
	readonly durationMs: number;
}

export type AlertRunEvents = {
	fetched: (snapshot: RawSnapshot) => void;
	fetchFailed: (error: FetchError) => void;
	rejected: (error: ValidationRejectedError) => void;
	alert: (event: AlertEvent) => void;
	suppressed: (suppression: Suppression) => void;
	storeError: (error: StoreError) => void;
	dispatched: (outcome: DispatchOutcome) => void;
	summary: (summary: RunSummary) => void;
};
