/**
 * SnapshotFetcher: concurrent, rate-limited snapshot acquisition.
 *
 * Equities are fetched by a bounded worker pool; index tickers go one at a
 * time through their own endpoint. Every provider request, including the
 * best-effort average-volume and intraday bar lookups, first takes a token
 * from the shared rate limiter. A failure for one ticker never affects the
 * others.
 */

import { runPool } from "../lib/concurrency/worker-pool.js";
import type { AcquireOptions } from "../lib/http/rate-limiter.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { AlertMonitorConfig, PriceSource } from "../shared/config.js";
import { FetchError, classifyError, isRateLimitTimeout } from "../shared/errors.js";
import { type Ticker, isIndexTicker } from "../shared/identifiers.js";
import { type Result, err, map, ok } from "../shared/result.js";
import { type Clock, SystemClock, calendarDate, shiftDate } from "../shared/time.js";
import { averageVolume, selectPrice } from "./calculations.js";
import type { MarketDataSource } from "./market-data-client.js";
import { type Bar, InstrumentKind, type RawSnapshot } from "./types.js";

/** Anything that can admit a request; satisfied by TokenBucketRateLimiter. */
export interface RequestGate {
	acquire(options?: AcquireOptions): Promise<void>;
}

export type FetcherSettings = Pick<
	AlertMonitorConfig,
	| "maxConcurrentFetches"
	| "rateLimitMaxWaitMs"
	| "priceSourcePrecedence"
	| "intradayAlerts"
	| "averageVolumeDays"
	| "marketTimeZone"
>;

export interface SnapshotFetcherConfig {
	readonly source: MarketDataSource;
	readonly gate: RequestGate;
	readonly settings: FetcherSettings;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

export interface FetchOptions {
	/** Epoch ms (per the fetcher's clock) after which no new request starts. */
	readonly deadline?: number;
	readonly signal?: AbortSignal;
}

export type FetchResults = Map<Ticker, Result<RawSnapshot, FetchError>>;

/** Bars requested per intraday lookup; enough for the longest window. */
const INTRADAY_BAR_LIMIT = 60;

/**
 * Indices publish only a live value (the `trade` slot) and the session close,
 * so they ignore the configured equity precedence.
 */
export const INDEX_PRICE_PRECEDENCE: readonly PriceSource[] = ["trade", "day"];

export class SnapshotFetcher {
	private readonly source: MarketDataSource;
	private readonly gate: RequestGate;
	private readonly settings: FetcherSettings;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(config: SnapshotFetcherConfig) {
		this.source = config.source;
		this.gate = config.gate;
		this.settings = config.settings;
		this.clock = config.clock ?? SystemClock;
		this.logger = config.logger ?? silentLogger;
	}

	/**
	 * Fetches a snapshot for every ticker. The returned map has one entry per
	 * unique input ticker, in input order.
	 */
	async fetch(tickers: readonly Ticker[], options: FetchOptions = {}): Promise<FetchResults> {
		const unique = [...new Set(tickers)];
		const equities = unique.filter((t) => !isIndexTicker(t));
		const indices = unique.filter((t) => isIndexTicker(t));

		const run = this.runSignal(options);
		try {
			const [equityResults, indexResults] = await Promise.all([
				this.fetchEquities(equities, options.deadline, run.signal),
				this.fetchIndices(indices, options.deadline, run.signal),
			]);
			const results: FetchResults = new Map();
			for (const t of unique) {
				const result = equityResults.get(t) ?? indexResults.get(t);
				if (result) results.set(t, result);
			}
			return results;
		} finally {
			run.dispose();
		}
	}

	// ── Paths ─────────────────────────────────────────────────────

	private async fetchEquities(
		tickers: readonly Ticker[],
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<FetchResults> {
		const results: FetchResults = new Map();
		if (tickers.length === 0) return results;

		const outcomes = await runPool(tickers, (t) => this.fetchOne(t, deadline, signal), {
			concurrency: this.settings.maxConcurrentFetches,
			signal,
		});
		for (const outcome of outcomes) {
			switch (outcome.status) {
				case "fulfilled":
					results.set(outcome.item, outcome.value);
					break;
				case "rejected":
					results.set(outcome.item, err(this.toFetchError(outcome.item, outcome.reason)));
					break;
				case "skipped":
					results.set(outcome.item, err(notStarted(outcome.item)));
					break;
			}
		}
		return results;
	}

	/** Indices are fetched strictly one after another. */
	private async fetchIndices(
		tickers: readonly Ticker[],
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<FetchResults> {
		const results: FetchResults = new Map();
		for (const t of tickers) {
			if (signal.aborted) {
				results.set(t, err(notStarted(t)));
				continue;
			}
			try {
				results.set(t, await this.fetchOne(t, deadline, signal));
			} catch (error) {
				results.set(t, err(this.toFetchError(t, error)));
			}
		}
		return results;
	}

	// ── Per ticker ────────────────────────────────────────────────

	private async fetchOne(
		t: Ticker,
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<Result<RawSnapshot, FetchError>> {
		const admitted = await this.admit(t, deadline, signal);
		if (!admitted.ok) return admitted;

		const quote = await this.source.snapshot(t, { signal });
		if (!quote.ok) {
			this.logger.warn({ ticker: t, err: quote.error.message }, "Snapshot fetch failed");
			return quote;
		}

		const isIndex = quote.value.kind === InstrumentKind.Index;
		const precedence = isIndex ? INDEX_PRICE_PRECEDENCE : this.settings.priceSourcePrecedence;
		const selected = selectPrice(quote.value.candidates, precedence);
		if (selected?.fallback) {
			this.logger.warn(
				{ ticker: t, from: selected.fallback.from, to: selected.fallback.to },
				"Preferred price source empty, using fallback",
			);
		}

		const today = calendarDate(this.clock.now(), this.settings.marketTimeZone);
		const average = isIndex ? undefined : await this.fetchAverageVolume(t, today, deadline, signal);
		const minuteBars = this.settings.intradayAlerts
			? await this.intraday(t, "minute", today, deadline, signal)
			: undefined;
		const secondBars = this.settings.intradayAlerts
			? await this.intraday(t, "second", today, deadline, signal)
			: undefined;

		return ok({
			ticker: t,
			kind: quote.value.kind,
			currentPrice: selected?.price ?? null,
			previousClose: quote.value.previousClose,
			volume: quote.value.volume,
			priceSource: selected?.source ?? null,
			...(selected?.fallback ? { priceFallback: selected.fallback } : {}),
			...(average !== undefined && average !== null ? { averageVolume: average } : {}),
			...(minuteBars ? { minuteBars } : {}),
			...(secondBars ? { secondBars } : {}),
			fetchedAt: this.clock.now(),
		});
	}

	private fetchAverageVolume(
		t: Ticker,
		today: string,
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<number | null | undefined> {
		return this.bestEffort(
			t,
			"average volume",
			deadline,
			signal,
			async (): Promise<Result<number | null, FetchError>> => {
				const bars = await this.source.dailyBars(
					t,
					shiftDate(today, -this.settings.averageVolumeDays),
					shiftDate(today, -1),
					{ signal },
				);
				return map(bars, averageVolume);
			},
		);
	}

	private intraday(
		t: Ticker,
		timespan: "minute" | "second",
		date: string,
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<Bar[] | undefined> {
		return this.bestEffort(t, `${timespan} bars`, deadline, signal, () =>
			this.source.intradayBars(t, timespan, date, INTRADAY_BAR_LIMIT, { signal }),
		);
	}

	/** A secondary lookup whose failure only omits its field. */
	private async bestEffort<T>(
		t: Ticker,
		what: string,
		deadline: number | undefined,
		signal: AbortSignal,
		call: () => Promise<Result<T, FetchError>>,
	): Promise<T | undefined> {
		const admitted = await this.admit(t, deadline, signal);
		const result = admitted.ok ? await call() : admitted;
		if (!result.ok) {
			this.logger.debug({ ticker: t, err: result.error.message }, `Skipping ${what}`);
			return undefined;
		}
		return result.value;
	}

	private async admit(
		t: Ticker,
		deadline: number | undefined,
		signal: AbortSignal,
	): Promise<Result<void, FetchError>> {
		try {
			await this.gate.acquire({
				maxWaitMs: this.settings.rateLimitMaxWaitMs,
				signal,
				...(deadline !== undefined ? { deadline } : {}),
			});
			return ok(undefined);
		} catch (error) {
			if (isRateLimitTimeout(error)) {
				return err(
					new FetchError(`Rate limit wait exceeded for ${t}: ${error.message}`, {
						ticker: t,
						cause: error,
					}),
				);
			}
			return err(this.toFetchError(t, error));
		}
	}

	private toFetchError(t: Ticker, error: unknown): FetchError {
		const classified = classifyError(error, { ticker: t });
		return classified instanceof FetchError
			? classified
			: new FetchError(classified.message, { ticker: t, cause: classified });
	}

	/** One signal that fires on the caller's signal or at the deadline. */
	private runSignal(options: FetchOptions): { signal: AbortSignal; dispose: () => void } {
		const controller = new AbortController();
		const external = options.signal;
		const onAbort = (): void => controller.abort(external?.reason);
		if (external?.aborted) {
			onAbort();
		} else {
			external?.addEventListener("abort", onAbort, { once: true });
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		if (options.deadline !== undefined) {
			const remainingMs = options.deadline - this.clock.now();
			if (remainingMs <= 0) {
				controller.abort(new Error("Run deadline reached"));
			} else {
				timer = setTimeout(() => controller.abort(new Error("Run deadline reached")), remainingMs);
			}
		}

		return {
			signal: controller.signal,
			dispose: () => {
				if (timer !== undefined) clearTimeout(timer);
				external?.removeEventListener("abort", onAbort);
			},
		};
	}
}

function notStarted(t: Ticker): FetchError {
	return new FetchError(`Fetch for ${t} not started before the run deadline`, { ticker: t });
}
