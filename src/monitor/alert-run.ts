/**
 * AlertRun: one pass from positions to dispatched alerts.
 *
 * Phases: fetch every unique ticker, validate, evaluate the valid snapshots,
 * dispatch the decided alerts. Per-ticker failures are recorded and the run
 * carries on; alerts decided before the deadline are always dispatched.
 */

import {
	type AlertEvent,
	AlertKind,
	type Suppression,
	type TickerEvaluation,
} from "../alerts/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { DataValidator } from "../market/data-validator.js";
import type { FetchOptions, FetchResults } from "../market/snapshot-fetcher.js";
import type { Snapshot } from "../market/types.js";
import type { DispatchOutcome, NotificationDispatcher } from "../notify/types.js";
import { PositionIndex } from "../position/position-index.js";
import type { PositionInput } from "../position/types.js";
import type { Ticker } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { AlertRunEvents, RunOptions, RunSummary } from "./types.js";

/** Satisfied by SnapshotFetcher. */
export interface SnapshotSource {
	fetch(tickers: readonly Ticker[], options?: FetchOptions): Promise<FetchResults>;
}

/** Satisfied by AlertEngine. */
export interface AlertEvaluator {
	evaluate(snapshot: Snapshot, positions: PositionIndex): Promise<TickerEvaluation>;
}

/** All dependencies required to construct an AlertRun. */
export interface AlertRunDeps {
	readonly fetcher: SnapshotSource;
	readonly validator: DataValidator;
	readonly engine: AlertEvaluator;
	readonly dispatcher: NotificationDispatcher;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export class AlertRun {
	readonly events = new TypedEmitter<AlertRunEvents>();
	private readonly fetcher: SnapshotSource;
	private readonly validator: DataValidator;
	private readonly engine: AlertEvaluator;
	private readonly dispatcher: NotificationDispatcher;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(deps: AlertRunDeps) {
		this.fetcher = deps.fetcher;
		this.validator = deps.validator;
		this.engine = deps.engine;
		this.dispatcher = deps.dispatcher;
		this.clock = deps.clock ?? SystemClock;
		this.logger = deps.logger ?? silentLogger;
	}

	async run(
		positions: PositionIndex | readonly PositionInput[],
		options: RunOptions = {},
	): Promise<RunSummary> {
		const startedAt = this.clock.now();
		const index = positions instanceof PositionIndex ? positions : PositionIndex.build(positions);
		const tickers = index.tickers();
		const errors: string[] = [];

		// Phase 1: fetch
		const results: FetchResults =
			tickers.length > 0 ? await this.fetcher.fetch(tickers, options) : new Map();
		const timedOut =
			(options.signal?.aborted ?? false) ||
			(options.deadline !== undefined && this.clock.now() >= options.deadline);

		// Phase 2: validate
		let fetched = 0;
		let rejected = 0;
		const valid: Snapshot[] = [];
		for (const result of results.values()) {
			if (!result.ok) {
				errors.push(result.error.message);
				this.emit("fetchFailed", result.error);
				continue;
			}
			fetched++;
			this.emit("fetched", result.value);
			const checked = this.validator.validate(result.value);
			if (!checked.ok) {
				rejected++;
				this.emit("rejected", checked.error);
				continue;
			}
			valid.push(checked.value);
		}

		// Phase 3: evaluate
		const alerts: AlertEvent[] = [];
		const suppressed: Suppression[] = [];
		const settled = await Promise.allSettled(valid.map((s) => this.engine.evaluate(s, index)));
		settled.forEach((result, i) => {
			if (result.status === "rejected") {
				const msg = result.reason instanceof Error ? result.reason.message : String(result.reason);
				const message = `Evaluation failed for ${valid[i]?.ticker ?? "unknown"}: ${msg}`;
				errors.push(message);
				this.logger.error({ ticker: valid[i]?.ticker }, message);
				return;
			}
			for (const storeError of result.value.storeErrors) {
				errors.push(storeError.message);
				this.emit("storeError", storeError);
			}
			for (const s of result.value.suppressed) {
				suppressed.push(s);
				this.emit("suppressed", s);
			}
			for (const event of result.value.alerts) {
				alerts.push(event);
				this.emit("alert", event);
			}
		});

		// Phase 4: dispatch, even past the deadline
		const outcomes = await Promise.all(alerts.map((event) => this.dispatchOne(event)));
		let sent = 0;
		let failed = 0;
		for (const outcome of outcomes) {
			for (const channel of outcome.channels) {
				if (channel.ok) {
					sent++;
				} else {
					failed++;
				}
			}
		}

		const count = (kind: AlertKind): number => alerts.filter((a) => a.kind === kind).length;
		const summary: RunSummary = {
			positionsChecked: index.size,
			uniqueTickers: tickers.length,
			duplicatesDropped: index.duplicatesDropped,
			invalidPositionsDropped: index.invalidDropped,
			snapshotsFetched: fetched,
			snapshotsRejected: rejected,
			alerts: {
				initial: count(AlertKind.Initial),
				incremental: count(AlertKind.Incremental),
				retrigger: count(AlertKind.Retrigger),
				total: alerts.length,
			},
			suppressed: suppressed.length,
			dispatch: { sent, failed },
			errors: { count: errors.length, messages: errors },
			alertEvents: alerts,
			timedOut,
			startedAt,
			durationMs: this.clock.now() - startedAt,
		};

		this.logger.info(
			{
				positionsChecked: summary.positionsChecked,
				snapshotsFetched: fetched,
				snapshotsRejected: rejected,
				alerts: summary.alerts,
				suppressed: summary.suppressed,
				dispatch: summary.dispatch,
				errors: errors.length,
				timedOut,
			},
			"Alert run complete",
		);
		this.emit("summary", summary);
		return summary;
	}

	// ── Internal ──────────────────────────────────────────────────

	private async dispatchOne(event: AlertEvent): Promise<DispatchOutcome> {
		let outcome: DispatchOutcome;
		try {
			outcome = await this.dispatcher.dispatch(event);
		} catch (error: unknown) {
			const msg = error instanceof Error ? error.message : String(error);
			this.logger.error({ ticker: event.ticker, err: msg }, "Dispatcher threw");
			outcome = {
				ticker: event.ticker,
				channels: [{ channel: "dispatcher", ok: false, error: msg }],
			};
		}
		this.emit("dispatched", outcome);
		return outcome;
	}

	/** Observers never interrupt the run. */
	private emit<K extends keyof AlertRunEvents & string>(
		event: K,
		...args: Parameters<AlertRunEvents[K]>
	): void {
		this.events.emitSafely(
			(error, name) => this.logger.warn({ event: name, err: String(error) }, "Run listener threw"),
			event,
			...args,
		);
	}
}
