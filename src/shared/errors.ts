/**
 * AlertError hierarchy: structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). Per-ticker
 * errors are recorded in the run summary; only fatal errors abort a run.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing AlertError subclasses with optional cause chain. */
interface AlertErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & AlertErrorOptions;

/** Base error class for every failure raised by the alert pipeline. */
export class AlertError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "AlertError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Provider or network failure for a single ticker. Never aborts the run. */
export class FetchError extends AlertError {
	readonly ticker: string | undefined;
	readonly status: number | undefined;

	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "FETCH_ERROR", ErrorCategory.Retryable, rest);
		this.name = "FetchError";
		this.ticker = typeof rest["ticker"] === "string" ? rest["ticker"] : undefined;
		this.status = typeof rest["status"] === "number" ? rest["status"] : undefined;
		if (cause !== undefined) this.cause = cause;
	}
}

/** A provider request that exceeded its deadline. */
export class ProviderTimeoutError extends FetchError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number, context: ErrorContext = {}) {
		super(message, { ...context, timeoutMs });
		this.name = "ProviderTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

/** The rate limiter could not admit a request within the wait budget. */
export class RateLimitTimeoutError extends AlertError {
	readonly waitedMs: number;

	constructor(message: string, waitedMs: number, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RATE_LIMIT_TIMEOUT", ErrorCategory.Retryable, { ...rest, waitedMs });
		this.name = "RateLimitTimeoutError";
		this.waitedMs = waitedMs;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Snapshot field that must be strictly positive. */
export type RequiredSnapshotField = "currentPrice" | "previousClose" | "volume";

/** A snapshot missing one or more required non-zero fields. */
export class ValidationRejectedError extends AlertError {
	readonly ticker: string;
	readonly fields: readonly RequiredSnapshotField[];

	constructor(ticker: string, fields: readonly RequiredSnapshotField[]) {
		super(
			`Snapshot for ${ticker} rejected: missing or zero ${fields.join(", ")}`,
			"VALIDATION_REJECTED",
			ErrorCategory.NonRetryable,
			{ ticker, fields },
		);
		this.name = "ValidationRejectedError";
		this.ticker = ticker;
		this.fields = fields;
	}
}

/** Alert-state store read or write failure. */
export class StoreError extends AlertError {
	readonly operation: "get" | "put";

	constructor(message: string, operation: "get" | "put", context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "STORE_ERROR", ErrorCategory.Retryable, { ...rest, operation });
		this.name = "StoreError";
		this.operation = operation;
		if (cause !== undefined) this.cause = cause;
	}
}

/** Missing or invalid configuration. Fatal: raised before any fetch begins. */
export class ConfigurationError extends AlertError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIGURATION_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigurationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A notification channel failed to deliver an alert. */
export class DispatchError extends AlertError {
	readonly channel: string;

	constructor(message: string, channel: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "DISPATCH_ERROR", ErrorCategory.NonRetryable, { ...rest, channel });
		this.name = "DispatchError";
		this.channel = channel;
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

function errorCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Classify an unknown thrown value raised while talking to the provider.
 * Anything that is not already an AlertError becomes a FetchError subtype.
 */
export function classifyError(error: unknown, context: Record<string, unknown> = {}): AlertError {
	if (error instanceof AlertError) return error;
	if (error instanceof Error) {
		const msg = error.message.toLowerCase();
		const code = errorCode(error);

		if (error.name === "TimeoutError" || code === "ETIMEDOUT" || msg.includes("timed out")) {
			const timeoutMs = typeof context["timeoutMs"] === "number" ? context["timeoutMs"] : 0;
			return new ProviderTimeoutError(error.message, timeoutMs, { ...context, cause: error });
		}
		if (error.name === "AbortError") {
			return new FetchError(`Request aborted: ${error.message}`, { ...context, cause: error });
		}
		if (code === "ECONNREFUSED" || code === "ENOTFOUND" || code === "ECONNRESET") {
			return new FetchError(error.message, { ...context, code, cause: error });
		}
		return new FetchError(error.message, { ...context, cause: error });
	}
	return new FetchError(String(error), { ...context, cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for FetchError (including timeouts). */
export function isFetchError(e: unknown): e is FetchError {
	return e instanceof FetchError;
}

/** Type guard for RateLimitTimeoutError. */
export function isRateLimitTimeout(e: unknown): e is RateLimitTimeoutError {
	return e instanceof RateLimitTimeoutError;
}

/** Type guard for StoreError. */
export function isStoreError(e: unknown): e is StoreError {
	return e instanceof StoreError;
}

/** Type guard for ConfigurationError. */
export function isConfigurationError(e: unknown): e is ConfigurationError {
	return e instanceof ConfigurationError;
}
