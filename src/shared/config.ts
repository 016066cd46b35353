/**
 * Alert monitor configuration.
 *
 * Defaults cover every tunable; `configFromEnv` overlays environment values
 * and `resolveConfig` validates the merged result. Any invalid value raises
 * ConfigurationError before the first provider request.
 */

import { validate, z } from "../lib/validation/index.js";
import { ConfigurationError } from "./errors.js";
import { isValidTimeZone } from "./time.js";

/** What the engine does when the alert-state store cannot be read. */
export const StoreFailurePolicy = {
	/** Send the alert anyway and risk a duplicate. */
	FailOpen: "fail-open",
	/** Suppress the alert and risk a missed notification. */
	FailClosed: "fail-closed",
} as const;

export type StoreFailurePolicy = (typeof StoreFailurePolicy)[keyof typeof StoreFailurePolicy];

/**
 * Provider fields the current price may be read from, in precedence order.
 * `minute` = latest minute bar close, `trade` = last trade price,
 * `quote` = last quote midpoint, `day` = session close so far.
 */
export const PRICE_SOURCES = ["minute", "trade", "quote", "day"] as const;
export type PriceSource = (typeof PRICE_SOURCES)[number];

export interface AlertMonitorConfig {
	/** Base threshold for an initial alert, in percent (absolute). */
	readonly thresholdPercent: number;
	/** Further movement, in percent, required for an incremental alert. */
	readonly incrementalStepPercent: number;
	/** Size of the snapshot worker pool. */
	readonly maxConcurrentFetches: number;
	/** Provider requests admitted per second, across all workers. */
	readonly providerRateLimitPerSec: number;
	/** Token-bucket burst; 1 keeps strict 1/N spacing. */
	readonly rateLimitBurst: number;
	/** Longest a single request may wait for the rate limiter. */
	readonly rateLimitMaxWaitMs: number;
	/** Deadline for each outbound provider request. */
	readonly fetchTimeoutMs: number;
	/** Retention of AlertRecords before the store expires them. */
	readonly alertRecordTtlDays: number;
	readonly storeFailurePolicy: StoreFailurePolicy;
	readonly priceSourcePrecedence: readonly PriceSource[];
	/** Also evaluate minute and second bar windows. */
	readonly intradayAlerts: boolean;
	readonly minuteWindowThresholdPercent: number;
	/** Second windows each have their own threshold: 5, 10 and 15 changes. */
	readonly fiveSecondThresholdPercent: number;
	readonly tenSecondThresholdPercent: number;
	readonly fifteenSecondThresholdPercent: number;
	/** Allow a session alert again once the cooldown has passed since the last one. */
	readonly alertRetriggering: boolean;
	readonly retriggerCooldownSeconds: number;
	/** Days of daily bars averaged for the volume context. */
	readonly averageVolumeDays: number;
	/** IANA zone whose calendar date keys the dedup ledger. */
	readonly marketTimeZone: string;
}

export const DEFAULT_ALERT_CONFIG: AlertMonitorConfig = {
	thresholdPercent: 5,
	incrementalStepPercent: 5,
	maxConcurrentFetches: 20,
	providerRateLimitPerSec: 20,
	rateLimitBurst: 1,
	rateLimitMaxWaitMs: 30_000,
	fetchTimeoutMs: 10_000,
	alertRecordTtlDays: 7,
	storeFailurePolicy: StoreFailurePolicy.FailClosed,
	priceSourcePrecedence: ["minute", "quote", "day"],
	intradayAlerts: false,
	minuteWindowThresholdPercent: 3,
	fiveSecondThresholdPercent: 1.5,
	tenSecondThresholdPercent: 2,
	fifteenSecondThresholdPercent: 2.5,
	alertRetriggering: false,
	retriggerCooldownSeconds: 3_600,
	averageVolumeDays: 30,
	marketTimeZone: "America/New_York",
};

/** Environment as handed in by the host; only string values are read. */
export type Env = Readonly<Record<string, string | undefined>>;

// ── Env parsing ──────────────────────────────────────────────────────

const positiveNumber = z
	.string()
	.trim()
	.regex(/^\d+(\.\d+)?$/, "must be a positive number")
	.transform(Number)
	.refine((n) => n > 0, "must be greater than zero");

const positiveInt = z
	.string()
	.trim()
	.regex(/^\d+$/, "must be a positive integer")
	.transform(Number)
	.refine((n) => n > 0, "must be greater than zero");

const booleanFlag = z
	.string()
	.trim()
	.toLowerCase()
	.pipe(z.enum(["true", "false"]))
	.transform((v) => v === "true");

const storePolicy = z.string().trim().toLowerCase().pipe(z.enum(["fail-open", "fail-closed"]));

const priceSources = z
	.string()
	.transform((raw) =>
		raw
			.split(",")
			.map((s) => s.trim().toLowerCase())
			.filter((s) => s.length > 0),
	)
	.pipe(z.array(z.enum(PRICE_SOURCES)).min(1, "must name at least one price source"));

function readEnv<S extends z.ZodTypeAny>(env: Env, key: string, schema: S): z.output<S> | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim().length === 0) return undefined;
	const parsed = validate(schema, raw);
	if (!parsed.ok) {
		throw new ConfigurationError(`Invalid ${key}: "${raw}" ${parsed.error.describe()}`, {
			variable: key,
		});
	}
	return parsed.value;
}

/** Mutable builder shape for assembling a Partial<AlertMonitorConfig>. */
type MutableConfig = { -readonly [K in keyof AlertMonitorConfig]?: AlertMonitorConfig[K] };

/**
 * Reads alert settings from environment variables. Unset variables are left
 * out so defaults apply.
 * @throws ConfigurationError if a variable holds an invalid value
 */
export function configFromEnv(env: Env): Partial<AlertMonitorConfig> {
	const result: MutableConfig = {};
	const assign = <K extends keyof AlertMonitorConfig>(
		key: K,
		value: AlertMonitorConfig[K] | undefined,
	): void => {
		if (value !== undefined) result[key] = value;
	};

	assign("thresholdPercent", readEnv(env, "ALERT_THRESHOLD_PERCENT", positiveNumber));
	assign("incrementalStepPercent", readEnv(env, "ALERT_INCREMENTAL_STEP_PERCENT", positiveNumber));
	assign("maxConcurrentFetches", readEnv(env, "MAX_CONCURRENT_FETCHES", positiveInt));
	assign("providerRateLimitPerSec", readEnv(env, "PROVIDER_RATE_LIMIT_PER_SEC", positiveInt));
	assign("rateLimitBurst", readEnv(env, "RATE_LIMIT_BURST", positiveInt));
	assign("rateLimitMaxWaitMs", readEnv(env, "RATE_LIMIT_MAX_WAIT_MS", positiveInt));
	assign("fetchTimeoutMs", readEnv(env, "FETCH_TIMEOUT_MS", positiveInt));
	assign("alertRecordTtlDays", readEnv(env, "ALERT_RECORD_TTL_DAYS", positiveInt));
	assign("storeFailurePolicy", readEnv(env, "STORE_FAILURE_POLICY", storePolicy));
	assign("priceSourcePrecedence", readEnv(env, "PRICE_SOURCE_PRECEDENCE", priceSources));
	assign("intradayAlerts", readEnv(env, "ENABLE_INTRADAY_ALERTS", booleanFlag));
	assign(
		"minuteWindowThresholdPercent",
		readEnv(env, "MINUTE_WINDOW_THRESHOLD_PERCENT", positiveNumber),
	);
	assign(
		"fiveSecondThresholdPercent",
		readEnv(env, "FIVE_CONSECUTIVE_SECONDS_THRESHOLD_PERCENT", positiveNumber),
	);
	assign(
		"tenSecondThresholdPercent",
		readEnv(env, "TEN_CONSECUTIVE_SECONDS_THRESHOLD_PERCENT", positiveNumber),
	);
	assign(
		"fifteenSecondThresholdPercent",
		readEnv(env, "FIFTEEN_CONSECUTIVE_SECONDS_THRESHOLD_PERCENT", positiveNumber),
	);
	assign("alertRetriggering", readEnv(env, "ENABLE_ALERT_RETRIGGERING", booleanFlag));
	assign(
		"retriggerCooldownSeconds",
		readEnv(env, "ALERT_RETRIGGER_COOLDOWN_SECONDS", positiveInt),
	);
	assign("averageVolumeDays", readEnv(env, "AVERAGE_VOLUME_DAYS", positiveInt));

	const timeZone = env["MARKET_TIME_ZONE"]?.trim();
	if (timeZone) result.marketTimeZone = timeZone;

	return result;
}

/**
 * Merges overrides onto the defaults and validates the result. When only the
 * threshold is overridden the incremental step follows it.
 * @throws ConfigurationError on any invariant violation
 */
export function resolveConfig(overrides: Partial<AlertMonitorConfig> = {}): AlertMonitorConfig {
	const thresholdPercent = overrides.thresholdPercent ?? DEFAULT_ALERT_CONFIG.thresholdPercent;
	const config: AlertMonitorConfig = {
		...DEFAULT_ALERT_CONFIG,
		...overrides,
		thresholdPercent,
		incrementalStepPercent: overrides.incrementalStepPercent ?? thresholdPercent,
	};
	validateConfig(config);
	return config;
}

/**
 * Checks the invariants of a fully-built config.
 * @throws ConfigurationError naming the offending field
 */
export function validateConfig(config: AlertMonitorConfig): void {
	const positive: Array<keyof AlertMonitorConfig> = [
		"thresholdPercent",
		"incrementalStepPercent",
		"minuteWindowThresholdPercent",
		"fiveSecondThresholdPercent",
		"tenSecondThresholdPercent",
		"fifteenSecondThresholdPercent",
	];
	for (const key of positive) {
		const value = config[key];
		if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
			throw new ConfigurationError(`${key} must be a positive number`, { [key]: value });
		}
	}

	const positiveInts: Array<keyof AlertMonitorConfig> = [
		"maxConcurrentFetches",
		"providerRateLimitPerSec",
		"rateLimitBurst",
		"rateLimitMaxWaitMs",
		"fetchTimeoutMs",
		"alertRecordTtlDays",
		"averageVolumeDays",
		"retriggerCooldownSeconds",
	];
	for (const key of positiveInts) {
		const value = config[key];
		if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
			throw new ConfigurationError(`${key} must be a positive integer`, { [key]: value });
		}
	}

	if (config.priceSourcePrecedence.length === 0) {
		throw new ConfigurationError("priceSourcePrecedence must name at least one source");
	}
	const known: readonly string[] = PRICE_SOURCES;
	const unknownSource = config.priceSourcePrecedence.find((s) => !known.includes(s));
	if (unknownSource !== undefined) {
		throw new ConfigurationError(`Unknown price source "${unknownSource}"`);
	}
	if (!isValidTimeZone(config.marketTimeZone)) {
		throw new ConfigurationError(`Unknown time zone "${config.marketTimeZone}"`, {
			marketTimeZone: config.marketTimeZone,
		});
	}
}
