/**
 * AlertEngine: turns validated snapshots into alert decisions.
 *
 * For every direction a ticker's positions watch, each window's move is run
 * through that window's ThresholdStateMachine. A crossing move reads the
 * ledger record for (ticker, date, window), decides initial, incremental,
 * retrigger or suppressed, and writes the record back for every alert.
 * Intraday windows hold one machine per window size; all of a window's sizes
 * share its ledger record. The read-decide-
 * write section is serialized per key, so two evaluations of one ticker in a
 * run never both alert on the same record.
 */

import { KeyedLock } from "../lib/concurrency/keyed-lock.js";
import type { Decimal } from "../lib/decimal/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { barChanges, percentChange, volumeRatio } from "../market/calculations.js";
import type { Bar, Snapshot } from "../market/types.js";
import type { PositionIndex } from "../position/position-index.js";
import { type AlertMonitorConfig, StoreFailurePolicy } from "../shared/config.js";
import { type WatchedDirection, directionOf } from "../shared/direction.js";
import { StoreError, isStoreError } from "../shared/errors.js";
import type { Ticker } from "../shared/identifiers.js";
import { type Clock, Duration, SystemClock, calendarDate } from "../shared/time.js";
import type { AlertStateStore } from "./alert-state-store.js";
import { ThresholdStateMachine } from "./threshold-machine.js";
import {
	AlertKind,
	type AlertEvent,
	type AlertRecord,
	AlertWindow,
	type MovementResult,
	type Suppression,
	type TickerEvaluation,
} from "./types.js";
import {
	type WindowRule,
	minuteWindowRules,
	secondWindowRules,
	strongestCrossing,
	strongestMove,
} from "./window-analysis.js";

export type EngineSettings = Pick<
	AlertMonitorConfig,
	| "thresholdPercent"
	| "incrementalStepPercent"
	| "alertRecordTtlDays"
	| "storeFailurePolicy"
	| "intradayAlerts"
	| "minuteWindowThresholdPercent"
	| "fiveSecondThresholdPercent"
	| "tenSecondThresholdPercent"
	| "fifteenSecondThresholdPercent"
	| "alertRetriggering"
	| "retriggerCooldownSeconds"
	| "marketTimeZone"
>;

export interface AlertEngineConfig {
	readonly store: AlertStateStore;
	readonly settings: EngineSettings;
	readonly clock?: Clock;
	readonly logger?: Logger;
	/** Share one lock between engines that write the same store. */
	readonly lock?: KeyedLock;
}

/** A move measured for one watched direction in one window. */
interface Measured {
	readonly machine: ThresholdStateMachine;
	readonly direction: WatchedDirection;
	readonly percent: Decimal;
	readonly bars?: number;
}

/** An intraday window's size rules and the machine of each size. */
interface IntradayWindow {
	readonly window: AlertWindow;
	readonly rules: readonly WindowRule[];
	readonly machines: ReadonlyMap<number, ThresholdStateMachine>;
}

function intradayWindow(window: AlertWindow, rules: readonly WindowRule[]): IntradayWindow {
	// each size escalates by its own threshold
	const machines = new Map(
		rules.map((rule): [number, ThresholdStateMachine] => [
			rule.size,
			new ThresholdStateMachine({
				window,
				thresholdPercent: rule.thresholdPercent,
				stepPercent: rule.thresholdPercent,
			}),
		]),
	);
	return { window, rules, machines };
}

type Outcome =
	| { readonly kind: "alert"; readonly event: AlertEvent; readonly storeErrors: StoreError[] }
	| {
			readonly kind: "suppressed";
			readonly suppression: Suppression;
			readonly storeErrors: StoreError[];
	  };

export class AlertEngine {
	private readonly store: AlertStateStore;
	private readonly settings: EngineSettings;
	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly lock: KeyedLock;
	private readonly session: ThresholdStateMachine;
	private readonly minute: IntradayWindow;
	private readonly second: IntradayWindow;

	constructor(config: AlertEngineConfig) {
		this.store = config.store;
		this.settings = config.settings;
		this.clock = config.clock ?? SystemClock;
		this.logger = config.logger ?? silentLogger;
		this.lock = config.lock ?? new KeyedLock();

		this.session = new ThresholdStateMachine({
			window: AlertWindow.Session,
			thresholdPercent: config.settings.thresholdPercent,
			stepPercent: config.settings.incrementalStepPercent,
			...(config.settings.alertRetriggering
				? { retriggerCooldownMs: Duration.seconds(config.settings.retriggerCooldownSeconds) }
				: {}),
		});
		this.minute = intradayWindow(AlertWindow.Minute, minuteWindowRules(config.settings));
		this.second = intradayWindow(AlertWindow.Second, secondWindowRules(config.settings));
	}

	/**
	 * Decides every alert for one ticker. Store failures never throw: they are
	 * handled by the configured policy and returned in `storeErrors`.
	 */
	async evaluate(snapshot: Snapshot, positions: PositionIndex): Promise<TickerEvaluation> {
		const t = snapshot.ticker;
		const directions = positions.watchedDirections(t);
		const sessionPercent = percentChange(snapshot.currentPrice, snapshot.previousClose);

		const movements: MovementResult[] = [
			{
				ticker: t,
				window: AlertWindow.Session,
				percentChange: sessionPercent.toNumber(),
				direction: directionOf(sessionPercent.toNumber()),
			},
		];
		const measured: Measured[] = directions.map((direction) => ({
			machine: this.session,
			direction,
			percent: sessionPercent,
		}));
		if (this.settings.intradayAlerts) {
			for (const [intraday, bars] of [
				[this.minute, snapshot.minuteBars],
				[this.second, snapshot.secondBars],
			] as const) {
				const moves = this.measureIntraday(t, intraday, bars, directions);
				movements.push(...moves.movements);
				measured.push(...moves.measured);
			}
		}

		const date = calendarDate(this.clock.now(), this.settings.marketTimeZone);
		const alerts: AlertEvent[] = [];
		const suppressed: Suppression[] = [];
		const storeErrors: StoreError[] = [];

		for (const m of measured) {
			if (!m.machine.crosses(m.percent, m.direction)) continue;
			const key = `${t}|${date}|${m.machine.window}`;
			const outcome = await this.lock.run(key, () => this.decide(snapshot, positions, date, m));
			storeErrors.push(...outcome.storeErrors);
			if (outcome.kind === "alert") {
				alerts.push(outcome.event);
			} else {
				suppressed.push(outcome.suppression);
			}
		}

		return { ticker: t, movements, alerts, suppressed, storeErrors };
	}

	// ── Windows ───────────────────────────────────────────────────

	/**
	 * Reports the strongest move of each watched direction, and measures the
	 * strongest move that reaches its own size's threshold.
	 */
	private measureIntraday(
		t: Ticker,
		intraday: IntradayWindow,
		bars: readonly Bar[] | undefined,
		directions: readonly WatchedDirection[],
	): { movements: MovementResult[]; measured: Measured[] } {
		const movements: MovementResult[] = [];
		const measured: Measured[] = [];
		if (!bars || bars.length < 2) return { movements, measured };
		const changes = barChanges(bars);
		const sizes = intraday.rules.map((rule) => rule.size);
		for (const direction of directions) {
			const move = strongestMove(changes, sizes, direction);
			if (move === null) continue;
			movements.push({
				ticker: t,
				window: intraday.window,
				percentChange: move.percentChange.toNumber(),
				direction,
				bars: move.bars,
			});
			const crossing = strongestCrossing(changes, intraday.rules, direction);
			const machine = crossing ? intraday.machines.get(crossing.bars) : undefined;
			if (!crossing || !machine) continue;
			measured.push({ machine, direction, percent: crossing.percentChange, bars: crossing.bars });
		}
		return { movements, measured };
	}

	// ── Decision (runs under the key's lock) ──────────────────────

	private async decide(
		snapshot: Snapshot,
		positions: PositionIndex,
		date: string,
		m: Measured,
	): Promise<Outcome> {
		const t = snapshot.ticker;
		const window = m.machine.window;
		const percent = m.percent.toNumber();
		const storeErrors: StoreError[] = [];

		let record: AlertRecord | null = null;
		let degraded = false;
		try {
			record = await this.store.get(t, date, window);
		} catch (error) {
			const storeError = toStoreError(error, "get", t);
			storeErrors.push(storeError);
			if (this.settings.storeFailurePolicy === StoreFailurePolicy.FailClosed) {
				this.logger.warn(
					{ ticker: t, window, err: storeError.message },
					"Alert store read failed, suppressing alert",
				);
				return {
					kind: "suppressed",
					suppression: {
						ticker: t,
						window,
						direction: m.direction,
						percentChange: percent,
						reason: "store-unavailable",
					},
					storeErrors,
				};
			}
			this.logger.warn(
				{ ticker: t, window, err: storeError.message },
				"Alert store read failed, alerting without dedup",
			);
			degraded = true;
		}

		const decision = m.machine.decide(m.percent, record, this.clock.now());
		if (decision.action === "suppressed") {
			this.logger.debug(
				{ ticker: t, window, percent, lastAlertedPercent: decision.previousPercent },
				"Alert suppressed, step not reached",
			);
			return {
				kind: "suppressed",
				suppression: {
					ticker: t,
					window,
					direction: m.direction,
					percentChange: percent,
					reason: "below-step",
					lastAlertedPercent: decision.previousPercent,
				},
				storeErrors,
			};
		}

		let alertCount = (record?.alertCount ?? 0) + 1;
		try {
			const written = await this.store.put(
				t,
				date,
				percent,
				Duration.days(this.settings.alertRecordTtlDays),
				window,
			);
			alertCount = written.alertCount;
		} catch (error) {
			const storeError = toStoreError(error, "put", t);
			storeErrors.push(storeError);
			this.logger.error(
				{ ticker: t, window, err: storeError.message },
				"Alert store write failed, alert still sent",
			);
		}

		const kind = alertKind(decision.action);
		const previousAlertedPercent =
			decision.action === "initial" ? undefined : decision.previousPercent;
		const event: AlertEvent = {
			ticker: t,
			date,
			kind,
			window,
			direction: m.direction,
			percentChange: percent,
			...(previousAlertedPercent !== undefined ? { previousAlertedPercent } : {}),
			currentPrice: snapshot.currentPrice,
			previousClose: snapshot.previousClose,
			volume: snapshot.volume,
			...(snapshot.averageVolume !== undefined ? { averageVolume: snapshot.averageVolume } : {}),
			volumeRatio: volumeRatio(snapshot.volume, snapshot.averageVolume),
			...(m.bars !== undefined ? { bars: m.bars } : {}),
			alertCount,
			positions: positions.matching(t, m.direction),
			reason: describe(m, kind, previousAlertedPercent),
			storeDegraded: degraded,
			decidedAt: this.clock.now(),
		};
		this.logger.info(
			{ ticker: t, kind, window, direction: m.direction, percent, alertCount },
			"Alert decided",
		);
		return { kind: "alert", event, storeErrors };
	}
}

// ── Helpers ──────────────────────────────────────────────────────────

function toStoreError(error: unknown, operation: "get" | "put", t: Ticker): StoreError {
	if (isStoreError(error)) return error;
	const msg = error instanceof Error ? error.message : String(error);
	return new StoreError(`Alert store ${operation} failed for ${t}: ${msg}`, operation, {
		ticker: t,
		cause: error,
	});
}

function alertKind(action: "initial" | "incremental" | "retrigger"): AlertKind {
	switch (action) {
		case "initial":
			return AlertKind.Initial;
		case "incremental":
			return AlertKind.Incremental;
		case "retrigger":
			return AlertKind.Retrigger;
	}
}

function signed(percent: number): string {
	return `${percent >= 0 ? "+" : ""}${percent.toFixed(2)}%`;
}

function windowLabel(m: Measured): string {
	switch (m.machine.window) {
		case AlertWindow.Session:
			return "Move from previous close";
		case AlertWindow.Minute:
			return `${m.bars ?? 0}-minute move`;
		case AlertWindow.Second:
			return `${m.bars ?? 0}-second move`;
	}
}

/** e.g. "Move from previous close of +5.20% (UP), last alerted at +5.00%" */
function describe(m: Measured, kind: AlertKind, previousAlertedPercent: number | undefined): string {
	const base = `${windowLabel(m)} of ${signed(m.percent.toNumber())} (${m.direction})`;
	if (previousAlertedPercent === undefined) return base;
	const last = `${base}, last alerted at ${signed(previousAlertedPercent)}`;
	return kind === AlertKind.Retrigger ? `${last}, retriggered after cooldown` : last;
}
