export { AlertEngine } from "./alert-engine.js";
export type { AlertEngineConfig, EngineSettings } from "./alert-engine.js";
export { recordKey } from "./alert-state-store.js";
export type { AlertStateStore } from "./alert-state-store.js";
export { ThresholdStateMachine } from "./threshold-machine.js";
export type { ThresholdDecision, ThresholdRule } from "./threshold-machine.js";
export { AlertKind, AlertWindow } from "./types.js";
export type {
	AlertEvent,
	AlertRecord,
	MovementResult,
	Suppression,
	SuppressionReason,
	TickerEvaluation,
} from "./types.js";
export {
	MINUTE_WINDOW_SIZES,
	SECOND_WINDOW_SIZES,
	minuteWindowRules,
	secondWindowRules,
	strongestCrossing,
	strongestMove,
} from "./window-analysis.js";
export type { WindowMove, WindowRule } from "./window-analysis.js";
