export { AlertRun } from "./alert-run.js";
export type { AlertEvaluator, AlertRunDeps, SnapshotSource } from "./alert-run.js";
export { createAlertRun } from "./create-alert-run.js";
export type { CreateAlertRunOptions } from "./create-alert-run.js";
export type { AlertRunEvents, RunOptions, RunSummary } from "./types.js";
