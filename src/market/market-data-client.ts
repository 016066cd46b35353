/**
 * MarketDataClient: Polygon REST endpoints behind Result error handling.
 *
 * Every request carries its own deadline and the caller's abort signal. HTTP
 * failures, timeouts and malformed payloads all come back as FetchError; the
 * client never throws.
 */

import { validate, z } from "../lib/validation/index.js";
import type { Env, PriceSource } from "../shared/config.js";
import { ConfigurationError, FetchError, ProviderTimeoutError, classifyError } from "../shared/errors.js";
import { type Ticker, isIndexTicker, providerSymbol } from "../shared/identifiers.js";
import { type Result, err, map, ok, tryCatchAsync } from "../shared/result.js";
import {
	type Bar,
	InstrumentKind,
	type IntradayTimespan,
	type PriceCandidates,
	type ProviderQuote,
	type RequestOptions,
} from "./types.js";

/** The subset of the fetch Response the client reads. */
export interface HttpResponse {
	readonly ok: boolean;
	readonly status: number;
	json(): Promise<unknown>;
}

export type FetchFn = (url: string, init: { readonly signal: AbortSignal }) => Promise<HttpResponse>;

export const DEFAULT_POLYGON_BASE_URL = "https://api.polygon.io";

export interface MarketDataClientConfig {
	readonly apiKey: string;
	readonly baseUrl?: string;
	/** Deadline for each request, in ms. */
	readonly timeoutMs: number;
	readonly fetchFn?: FetchFn;
}

/** Endpoints the snapshot fetcher depends on. */
export interface MarketDataSource {
	snapshot(ticker: Ticker, options?: RequestOptions): Promise<Result<ProviderQuote, FetchError>>;
	dailyBars(
		ticker: Ticker,
		from: string,
		to: string,
		options?: RequestOptions,
	): Promise<Result<Bar[], FetchError>>;
	intradayBars(
		ticker: Ticker,
		timespan: IntradayTimespan,
		date: string,
		limit: number,
		options?: RequestOptions,
	): Promise<Result<Bar[], FetchError>>;
}

// ── Response schemas ─────────────────────────────────────────────────

const price = z.number().nullish();

const ohlcv = z.object({ c: price, v: price }).partial();

const stockSnapshotSchema = z.object({
	ticker: z
		.object({
			day: ohlcv.optional(),
			min: ohlcv.optional(),
			prevDay: ohlcv.optional(),
			lastTrade: z.object({ p: price }).partial().optional(),
			lastQuote: z.object({ p: price, P: price }).partial().optional(),
		})
		.optional(),
});

const indexSnapshotSchema = z.object({
	results: z
		.array(
			z.object({
				value: price,
				session: z.object({ close: price, previous_close: price }).partial().optional(),
				error: z.string().optional(),
			}),
		)
		.optional(),
});

const aggregatesSchema = z.object({
	results: z
		.array(
			z.object({
				c: z.number(),
				v: z.number().optional(),
				t: z.number(),
			}),
		)
		.optional(),
});

type StockSnapshot = NonNullable<z.output<typeof stockSnapshotSchema>["ticker"]>;

function positive(value: number | null | undefined): number | null {
	return typeof value === "number" && value > 0 ? value : null;
}

function quoteMidpoint(bid: number | null | undefined, ask: number | null | undefined): number | null {
	const b = positive(bid);
	const a = positive(ask);
	return b !== null && a !== null ? (b + a) / 2 : null;
}

function candidates(entries: ReadonlyArray<readonly [PriceSource, number | null]>): PriceCandidates {
	const result: Partial<Record<PriceSource, number>> = {};
	for (const [source, value] of entries) {
		if (value !== null) result[source] = value;
	}
	return result;
}

function stockQuote(ticker: Ticker, data: StockSnapshot): ProviderQuote {
	return {
		ticker,
		kind: InstrumentKind.Equity,
		candidates: candidates([
			["minute", positive(data.min?.c)],
			["trade", positive(data.lastTrade?.p)],
			["quote", quoteMidpoint(data.lastQuote?.p, data.lastQuote?.P)],
			["day", positive(data.day?.c)],
		]),
		previousClose: positive(data.prevDay?.c),
		// day volume covers the whole session; the minute bar only its last minute
		volume: positive(data.day?.v) ?? positive(data.min?.v),
	};
}

// ── Client ───────────────────────────────────────────────────────────

export class MarketDataClient implements MarketDataSource {
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchFn: FetchFn;

	constructor(config: MarketDataClientConfig) {
		if (config.apiKey.trim().length === 0) {
			throw new ConfigurationError("Provider API key is required");
		}
		this.apiKey = config.apiKey;
		this.baseUrl = (config.baseUrl ?? DEFAULT_POLYGON_BASE_URL).replace(/\/+$/, "");
		this.timeoutMs = config.timeoutMs;
		this.fetchFn = config.fetchFn ?? ((url, init) => fetch(url, init));
	}

	/**
	 * Latest reading for a ticker. Index tickers go to the indices endpoint,
	 * everything else to the stocks snapshot.
	 */
	async snapshot(ticker: Ticker, options: RequestOptions = {}): Promise<Result<ProviderQuote, FetchError>> {
		return isIndexTicker(ticker)
			? this.indexSnapshot(ticker, options)
			: this.stockSnapshot(ticker, options);
	}

	/** Daily bars between two calendar dates, inclusive, oldest first. */
	async dailyBars(
		ticker: Ticker,
		from: string,
		to: string,
		options: RequestOptions = {},
	): Promise<Result<Bar[], FetchError>> {
		const symbol = encodeURIComponent(providerSymbol(ticker));
		return this.aggregates(
			ticker,
			`/v2/aggs/ticker/${symbol}/range/1/day/${from}/${to}`,
			{ adjusted: "true", sort: "asc", limit: "50" },
			options,
		);
	}

	/** The latest `limit` intraday bars of `date`, oldest first. */
	async intradayBars(
		ticker: Ticker,
		timespan: IntradayTimespan,
		date: string,
		limit: number,
		options: RequestOptions = {},
	): Promise<Result<Bar[], FetchError>> {
		const symbol = encodeURIComponent(providerSymbol(ticker));
		const bars = await this.aggregates(
			ticker,
			`/v2/aggs/ticker/${symbol}/range/1/${timespan}/${date}/${date}`,
			{ adjusted: "true", sort: "desc", limit: String(limit) },
			options,
		);
		return map(bars, (b) => b.reverse());
	}

	// ── Internal ──────────────────────────────────────────────────

	private async stockSnapshot(
		ticker: Ticker,
		options: RequestOptions,
	): Promise<Result<ProviderQuote, FetchError>> {
		const symbol = encodeURIComponent(providerSymbol(ticker));
		const path = `/v2/snapshot/locale/us/markets/stocks/tickers/${symbol}`;
		const body = await this.request(ticker, path, {}, stockSnapshotSchema, options);
		if (!body.ok) return body;
		const data = body.value.ticker;
		if (!data) {
			return err(new FetchError(`No snapshot data for ${ticker}`, { ticker }));
		}
		return ok(stockQuote(ticker, data));
	}

	private async indexSnapshot(
		ticker: Ticker,
		options: RequestOptions,
	): Promise<Result<ProviderQuote, FetchError>> {
		const body = await this.request(
			ticker,
			"/v3/snapshot/indices",
			{ "ticker.any_of": providerSymbol(ticker) },
			indexSnapshotSchema,
			options,
		);
		if (!body.ok) return body;
		const result = body.value.results?.[0];
		if (!result || result.error !== undefined) {
			return err(new FetchError(`No index data for ${ticker}`, { ticker }));
		}
		return ok({
			ticker,
			kind: InstrumentKind.Index,
			candidates: candidates([
				["trade", positive(result.value)],
				["day", positive(result.session?.close)],
			]),
			previousClose: positive(result.session?.previous_close),
			volume: null,
		});
	}

	private async aggregates(
		ticker: Ticker,
		path: string,
		query: Record<string, string>,
		options: RequestOptions,
	): Promise<Result<Bar[], FetchError>> {
		const body = await this.request(ticker, path, query, aggregatesSchema, options);
		return map(body, (b) =>
			(b.results ?? []).map((r) => ({ close: r.c, volume: r.v ?? 0, timestamp: r.t })),
		);
	}

	private async request<S extends z.ZodTypeAny>(
		ticker: Ticker,
		path: string,
		query: Record<string, string>,
		schema: S,
		options: RequestOptions,
	): Promise<Result<z.output<S>, FetchError>> {
		const url = new URL(`${this.baseUrl}${path}`);
		for (const [key, value] of Object.entries(query)) {
			url.searchParams.set(key, value);
		}
		url.searchParams.set("apiKey", this.apiKey);

		const controller = new AbortController();
		const timeout = new ProviderTimeoutError(
			`Provider request for ${ticker} timed out after ${this.timeoutMs}ms`,
			this.timeoutMs,
			{ ticker },
		);
		const timer = setTimeout(() => controller.abort(timeout), this.timeoutMs);
		const external = options.signal;
		const onAbort = (): void => controller.abort(external?.reason);
		if (external?.aborted) {
			onAbort();
		} else {
			external?.addEventListener("abort", onAbort, { once: true });
		}

		const failed = (error: unknown): FetchError => {
			if (controller.signal.reason === timeout) return timeout;
			const classified = classifyError(error, { ticker, timeoutMs: this.timeoutMs });
			return classified instanceof FetchError
				? classified
				: new FetchError(classified.message, { ticker, cause: classified });
		};

		try {
			const response = await tryCatchAsync(
				() => this.fetchFn(url.toString(), { signal: controller.signal }),
				failed,
			);
			if (!response.ok) return response;
			const res = response.value;
			if (!res.ok) {
				return err(
					new FetchError(`Provider returned HTTP ${res.status} for ${ticker}`, {
						ticker,
						status: res.status,
					}),
				);
			}
			const payload = await tryCatchAsync(() => res.json(), failed);
			if (!payload.ok) return payload;
			const parsed = validate(schema, payload.value);
			if (!parsed.ok) {
				return err(
					new FetchError(`Malformed provider response for ${ticker}: ${parsed.error.describe()}`, {
						ticker,
					}),
				);
			}
			return ok(parsed.value);
		} finally {
			clearTimeout(timer);
			external?.removeEventListener("abort", onAbort);
		}
	}
}

/**
 * Client settings from `POLYGON_API_KEY` and `POLYGON_BASE_URL`.
 * @throws ConfigurationError if the API key is missing
 */
export function clientConfigFromEnv(env: Env, timeoutMs: number): MarketDataClientConfig {
	const apiKey = env["POLYGON_API_KEY"]?.trim();
	if (!apiKey) {
		throw new ConfigurationError("POLYGON_API_KEY is required", { variable: "POLYGON_API_KEY" });
	}
	const baseUrl = env["POLYGON_BASE_URL"]?.trim();
	return { apiKey, timeoutMs, ...(baseUrl ? { baseUrl } : {}) };
}
