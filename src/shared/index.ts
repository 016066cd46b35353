export {
	type Ticker,
	INDEX_TICKER_PREFIX,
	PROVIDER_INDEX_PREFIX,
	ticker,
	tryTicker,
	isIndexTicker,
	providerSymbol,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	tryCatchAsync,
} from "./result.js";

export {
	ErrorCategory,
	AlertError,
	FetchError,
	ProviderTimeoutError,
	RateLimitTimeoutError,
	type RequiredSnapshotField,
	ValidationRejectedError,
	StoreError,
	ConfigurationError,
	DispatchError,
	classifyError,
	isFetchError,
	isRateLimitTimeout,
	isStoreError,
	isConfigurationError,
} from "./errors.js";

export {
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	calendarDate,
	shiftDate,
	isValidTimeZone,
} from "./time.js";

export {
	type AlertMonitorConfig,
	type Env,
	type PriceSource,
	DEFAULT_ALERT_CONFIG,
	PRICE_SOURCES,
	StoreFailurePolicy,
	configFromEnv,
	resolveConfig,
	validateConfig,
} from "./config.js";

export {
	Direction,
	type WatchedDirection,
	OptionType,
	directionFor,
	directionOf,
} from "./direction.js";
