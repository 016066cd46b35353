/**
 * ThresholdStateMachine: one escalation ladder per (ticker, date, window).
 *
 * NoAlert → Alerted(p) → Alerted(p') where |p'| − |p| ≥ step. With a
 * retrigger cooldown, a crossing move also alerts again once the cooldown has
 * passed since the last alert, whatever the step. The machine is pure: it
 * reads the current ledger record and returns a decision. Writing the record
 * is the engine's job.
 */

import { Decimal } from "../lib/decimal/index.js";
import { Direction, type WatchedDirection } from "../shared/direction.js";
import type { AlertRecord, AlertWindow } from "./types.js";

export interface ThresholdRule {
	readonly window: AlertWindow;
	/** Absolute percent a move must reach in the watched direction. */
	readonly thresholdPercent: number;
	/** Further absolute percent beyond the last alert for an incremental alert. */
	readonly stepPercent: number;
	/** Time after the last alert when any crossing alerts again; unset never retriggers. */
	readonly retriggerCooldownMs?: number;
}

export type ThresholdDecision =
	| { readonly action: "initial" }
	| { readonly action: "incremental"; readonly previousPercent: number }
	| { readonly action: "retrigger"; readonly previousPercent: number }
	| { readonly action: "suppressed"; readonly previousPercent: number; readonly delta: Decimal };

export class ThresholdStateMachine {
	readonly rule: ThresholdRule;
	private readonly threshold: Decimal;
	private readonly step: Decimal;

	constructor(rule: ThresholdRule) {
		if (!(rule.thresholdPercent > 0) || !(rule.stepPercent > 0)) {
			throw new RangeError(
				`Threshold and step must be positive, got ${rule.thresholdPercent} and ${rule.stepPercent}`,
			);
		}
		if (rule.retriggerCooldownMs !== undefined && !(rule.retriggerCooldownMs > 0)) {
			throw new RangeError(`Retrigger cooldown must be positive, got ${rule.retriggerCooldownMs}`);
		}
		this.rule = rule;
		this.threshold = Decimal.from(rule.thresholdPercent);
		this.step = Decimal.from(rule.stepPercent);
	}

	get window(): AlertWindow {
		return this.rule.window;
	}

	/** UP needs percent ≥ +threshold, DOWN needs percent ≤ −threshold. */
	crosses(percent: Decimal, direction: WatchedDirection): boolean {
		return direction === Direction.Up
			? percent.gte(this.threshold)
			: percent.lte(this.threshold.neg());
	}

	/** Next step for a crossing move, given the record for its key and the time now. */
	decide(percent: Decimal, record: AlertRecord | null, now: number): ThresholdDecision {
		if (record === null) return { action: "initial" };
		const cooldown = this.rule.retriggerCooldownMs;
		if (cooldown !== undefined && now - record.alertedAt >= cooldown) {
			return { action: "retrigger", previousPercent: record.lastAlertedPercent };
		}
		const delta = percent.abs().sub(Decimal.from(record.lastAlertedPercent).abs());
		if (delta.gte(this.step)) {
			return { action: "incremental", previousPercent: record.lastAlertedPercent };
		}
		return { action: "suppressed", previousPercent: record.lastAlertedPercent, delta };
	}
}
