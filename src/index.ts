// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Ticker,
	ticker,
	tryTicker,
	isIndexTicker,
	providerSymbol,
	type Result,
	ok,
	err,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	calendarDate,
	type AlertMonitorConfig,
	type Env,
	type PriceSource,
	DEFAULT_ALERT_CONFIG,
	PRICE_SOURCES,
	StoreFailurePolicy,
	configFromEnv,
	resolveConfig,
	validateConfig,
	ErrorCategory,
	AlertError,
	FetchError,
	ProviderTimeoutError,
	RateLimitTimeoutError,
	ValidationRejectedError,
	StoreError,
	ConfigurationError,
	DispatchError,
	classifyError,
	isFetchError,
	isRateLimitTimeout,
	isStoreError,
	isConfigurationError,
	Direction,
	type WatchedDirection,
	OptionType,
	directionFor,
	directionOf,
} from "./shared/index.js";

// ── Library wrappers ─────────────────────────────────────────────────
export { Decimal } from "./lib/decimal/index.js";
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	parseLogLevel,
	silentLogger,
} from "./lib/logger/index.js";
export { SchemaValidationError, validate } from "./lib/validation/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
export {
	TokenBucketRateLimiter,
	type AcquireOptions,
	type RateLimiterConfig,
	type RateLimiterStats,
} from "./lib/http/index.js";
export { KeyedLock, runPool, type PoolOutcome } from "./lib/concurrency/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	PositionIndex,
	parsePositions,
	parsePositionsJson,
	type ParsedPositions,
	type Position,
	type PositionInput,
	type SkippedRow,
} from "./position/index.js";

// ── Market data ──────────────────────────────────────────────────────
export {
	MarketDataClient,
	clientConfigFromEnv,
	DEFAULT_POLYGON_BASE_URL,
	SnapshotFetcher,
	DataValidator,
	validateSnapshot,
	percentChange,
	InstrumentKind,
	type Bar,
	type FetchFn,
	type FetchOptions,
	type FetchResults,
	type HttpResponse,
	type MarketDataClientConfig,
	type MarketDataSource,
	type RawSnapshot,
	type RequestGate,
	type Snapshot,
} from "./market/index.js";

// ── Alerts ───────────────────────────────────────────────────────────
export {
	AlertEngine,
	ThresholdStateMachine,
	AlertKind,
	AlertWindow,
	strongestCrossing,
	strongestMove,
	type AlertEngineConfig,
	type AlertEvent,
	type AlertRecord,
	type AlertStateStore,
	type EngineSettings,
	type MovementResult,
	type Suppression,
	type TickerEvaluation,
	type ThresholdRule,
	type WindowRule,
} from "./alerts/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export { FileAlertStore, MemoryAlertStore, type FileAlertStoreConfig } from "./persistence/index.js";

// ── Notification ─────────────────────────────────────────────────────
export {
	FanoutDispatcher,
	LogChannel,
	type AlertChannel,
	type ChannelOutcome,
	type DispatchOutcome,
	type NotificationDispatcher,
} from "./notify/index.js";

// ── Run ──────────────────────────────────────────────────────────────
export {
	AlertRun,
	createAlertRun,
	type AlertRunDeps,
	type AlertRunEvents,
	type CreateAlertRunOptions,
	type RunOptions,
	type RunSummary,
} from "./monitor/index.js";
