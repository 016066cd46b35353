import { describe, expect, it, vi } from "vitest";
import type { Logger } from "../lib/logger/index.js";
import { DEFAULT_ALERT_CONFIG } from "../shared/config.js";
import { FetchError, ProviderTimeoutError, RateLimitTimeoutError } from "../shared/errors.js";
import { type Ticker, isIndexTicker, ticker } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { validateSnapshot } from "./data-validator.js";
import { MarketDataClient, type MarketDataSource } from "./market-data-client.js";
import { type FetcherSettings, type RequestGate, SnapshotFetcher } from "./snapshot-fetcher.js";
import type { Bar, IntradayTimespan, ProviderQuote } from "./types.js";

// 2024-03-14 11:00 in New York
const NOW = Date.UTC(2024, 2, 14, 15, 0);

const settings: FetcherSettings = {
	maxConcurrentFetches: 4,
	rateLimitMaxWaitMs: 1_000,
	priceSourcePrecedence: DEFAULT_ALERT_CONFIG.priceSourcePrecedence,
	intradayAlerts: false,
	averageVolumeDays: 30,
	marketTimeZone: "America/New_York",
};

function quote(t: string, overrides: Partial<ProviderQuote> = {}): ProviderQuote {
	const index = isIndexTicker(ticker(t));
	return {
		ticker: ticker(t),
		kind: index ? "index" : "equity",
		candidates: index ? { trade: 105 } : { minute: 105 },
		previousClose: 100,
		volume: index ? null : 1_000,
		...overrides,
	};
}

class FakeSource implements MarketDataSource {
	readonly quotes = new Map<string, Result<ProviderQuote, FetchError>>();
	daily: Result<Bar[], FetchError> = ok([
		{ close: 100, volume: 400, timestamp: 1 },
		{ close: 101, volume: 600, timestamp: 2 },
	]);
	readonly dailyCalls: Array<[string, string, string]> = [];
	readonly intradayCalls: Array<[string, IntradayTimespan, string, number]> = [];
	readonly started: string[] = [];
	delayMs = 0;
	inFlight = 0;
	maxInFlight = 0;
	maxIndexInFlight = 0;
	private indexInFlight = 0;

	async snapshot(t: Ticker): Promise<Result<ProviderQuote, FetchError>> {
		this.started.push(t);
		const index = isIndexTicker(t);
		this.inFlight++;
		if (index) this.indexInFlight++;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
		this.maxIndexInFlight = Math.max(this.maxIndexInFlight, this.indexInFlight);
		await new Promise((resolve) => setTimeout(resolve, this.delayMs));
		this.inFlight--;
		if (index) this.indexInFlight--;
		return this.quotes.get(t) ?? ok(quote(t));
	}

	async dailyBars(t: Ticker, from: string, to: string): Promise<Result<Bar[], FetchError>> {
		this.dailyCalls.push([t, from, to]);
		return this.daily;
	}

	async intradayBars(
		t: Ticker,
		timespan: IntradayTimespan,
		date: string,
		limit: number,
	): Promise<Result<Bar[], FetchError>> {
		this.intradayCalls.push([t, timespan, date, limit]);
		return ok([{ close: timespan === "minute" ? 1 : 2, volume: 1, timestamp: 0 }]);
	}
}

const openGate: RequestGate = { acquire: async () => {} };

function makeLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
	const logger = {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		child: (): Logger => logger,
	};
	return logger;
}

function makeFetcher(
	source: MarketDataSource,
	overrides: Partial<FetcherSettings> = {},
	gate: RequestGate = openGate,
	logger?: Logger,
): SnapshotFetcher {
	return new SnapshotFetcher({
		source,
		gate,
		settings: { ...settings, ...overrides },
		clock: new FakeClock(NOW),
		...(logger ? { logger } : {}),
	});
}

const tickers = (...symbols: string[]): Ticker[] => symbols.map((s) => ticker(s));

describe("SnapshotFetcher", () => {
	it("returns one result per unique ticker in input order", async () => {
		const source = new FakeSource();
		const results = await makeFetcher(source).fetch(tickers("MSFT", "$SPX", "AAPL", "MSFT"));

		expect([...results.keys()]).toEqual(["MSFT", "$SPX", "AAPL"]);
		expect(source.started.filter((t) => t === "MSFT")).toHaveLength(1);
	});

	it("builds a raw snapshot with average volume", async () => {
		const source = new FakeSource();
		const results = await makeFetcher(source).fetch(tickers("AAPL"));

		expect(results.get(ticker("AAPL"))).toEqual({
			ok: true,
			value: {
				ticker: "AAPL",
				kind: "equity",
				currentPrice: 105,
				previousClose: 100,
				volume: 1_000,
				priceSource: "minute",
				averageVolume: 500,
				fetchedAt: NOW,
			},
		});
		expect(source.dailyCalls).toEqual([["AAPL", "2024-02-13", "2024-03-13"]]);
	});

	it("omits the average when the volume lookup fails", async () => {
		const source = new FakeSource();
		source.daily = err(new FetchError("HTTP 500", { ticker: "AAPL", status: 500 }));

		const results = await makeFetcher(source).fetch(tickers("AAPL"));

		const result = results.get(ticker("AAPL"));
		expect(result?.ok).toBe(true);
		if (!result?.ok) return;
		expect(result.value.averageVolume).toBeUndefined();
	});

	it("isolates a failing ticker from the others", async () => {
		const source = new FakeSource();
		source.quotes.set(
			"MSFT",
			err(new ProviderTimeoutError("Provider request for MSFT timed out", 10_000, { ticker: "MSFT" })),
		);

		const results = await makeFetcher(source).fetch(tickers("AAPL", "MSFT", "NVDA"));

		const failures = [...results.values()].filter((r) => !r.ok);
		expect(failures).toHaveLength(1);
		expect(results.get(ticker("AAPL"))?.ok).toBe(true);
		expect(results.get(ticker("NVDA"))?.ok).toBe(true);
		expect(results.get(ticker("MSFT"))).toMatchObject({
			ok: false,
			error: { name: "ProviderTimeoutError" },
		});
	});

	it("records and logs a price fallback", async () => {
		const source = new FakeSource();
		source.quotes.set("AAPL", ok(quote("AAPL", { candidates: { quote: 104.25, day: 104 } })));
		const logger = makeLogger();

		const results = await makeFetcher(source, {}, openGate, logger).fetch(tickers("AAPL"));

		expect(results.get(ticker("AAPL"))).toMatchObject({
			ok: true,
			value: {
				currentPrice: 104.25,
				priceSource: "quote",
				priceFallback: { from: "minute", to: "quote" },
			},
		});
		expect(logger.warn).toHaveBeenCalledWith(
			{ ticker: "AAPL", from: "minute", to: "quote" },
			"Preferred price source empty, using fallback",
		);
	});

	it("leaves the price empty when no source has one", async () => {
		const source = new FakeSource();
		source.quotes.set("AAPL", ok(quote("AAPL", { candidates: {} })));

		const results = await makeFetcher(source).fetch(tickers("AAPL"));

		expect(results.get(ticker("AAPL"))).toMatchObject({
			ok: true,
			value: { currentPrice: null, priceSource: null },
		});
	});

	it("bounds the number of concurrent equity fetches", async () => {
		const source = new FakeSource();
		source.delayMs = 5;

		await makeFetcher(source, { maxConcurrentFetches: 2 }).fetch(
			tickers("A", "B", "C", "D", "E", "F"),
		);

		expect(source.maxInFlight).toBe(2);
		expect(source.started).toHaveLength(6);
	});

	it("fetches indices one at a time without an average volume", async () => {
		const source = new FakeSource();
		source.delayMs = 5;

		const results = await makeFetcher(source).fetch(tickers("$SPX", "$NDX", "$VIX"));

		expect(source.maxIndexInFlight).toBe(1);
		expect(source.dailyCalls).toEqual([]);
		expect(results.get(ticker("$NDX"))).toMatchObject({ ok: true, value: { kind: "index" } });
	});

	it("turns a rate limit timeout into a FetchError", async () => {
		const source = new FakeSource();
		const gate: RequestGate = {
			acquire: async () => {
				throw new RateLimitTimeoutError("Timeout waiting for rate limit token", 1_000);
			},
		};

		const results = await makeFetcher(source, {}, gate).fetch(tickers("AAPL"));

		const result = results.get(ticker("AAPL"));
		expect(result?.ok).toBe(false);
		if (result?.ok !== false) return;
		expect(result.error).toBeInstanceOf(FetchError);
		expect(result.error.message).toBe(
			"Rate limit wait exceeded for AAPL: Timeout waiting for rate limit token",
		);
		expect(source.started).toEqual([]);
	});

	it("passes the wait budget and deadline to the gate", async () => {
		const acquire = vi.fn(async () => {});

		await makeFetcher(new FakeSource(), {}, { acquire }).fetch(tickers("AAPL"), {
			deadline: NOW + 60_000,
		});

		expect(acquire).toHaveBeenCalledWith(
			expect.objectContaining({ maxWaitMs: 1_000, deadline: NOW + 60_000 }),
		);
	});

	it("reports every ticker as not started once the deadline has passed", async () => {
		const source = new FakeSource();

		const results = await makeFetcher(source).fetch(tickers("AAPL", "$SPX"), {
			deadline: NOW - 1,
		});

		expect(source.started).toEqual([]);
		expect(results.get(ticker("AAPL"))).toMatchObject({
			ok: false,
			error: { message: "Fetch for AAPL not started before the run deadline" },
		});
		expect(results.get(ticker("$SPX"))).toMatchObject({
			ok: false,
			error: { message: "Fetch for $SPX not started before the run deadline" },
		});
	});

	it("attaches intraday bars when enabled", async () => {
		const source = new FakeSource();

		const results = await makeFetcher(source, { intradayAlerts: true }).fetch(tickers("AAPL"));

		expect(source.intradayCalls).toEqual([
			["AAPL", "minute", "2024-03-14", 60],
			["AAPL", "second", "2024-03-14", 60],
		]);
		expect(results.get(ticker("AAPL"))).toMatchObject({
			ok: true,
			value: {
				minuteBars: [{ close: 1, volume: 1, timestamp: 0 }],
				secondBars: [{ close: 2, volume: 1, timestamp: 0 }],
			},
		});
	});

	describe("index pricing with the provider client", () => {
		function indexClient(result: Record<string, unknown>): MarketDataClient {
			return new MarketDataClient({
				apiKey: "test-key",
				timeoutMs: 1_000,
				fetchFn: async () => ({ ok: true, status: 200, json: async () => ({ results: [result] }) }),
			});
		}

		it("prices an index from its live value", async () => {
			const logger = makeLogger();
			const client = indexClient({ value: 5_300, session: { previous_close: 5_000 } });

			const results = await makeFetcher(client, {}, openGate, logger).fetch(tickers("$SPX"));

			expect(results.get(ticker("$SPX"))).toEqual({
				ok: true,
				value: {
					ticker: "$SPX",
					kind: "index",
					currentPrice: 5_300,
					previousClose: 5_000,
					volume: null,
					priceSource: "trade",
					fetchedAt: NOW,
				},
			});
			expect(logger.warn).not.toHaveBeenCalled();
		});

		it("passes validation without a session close", async () => {
			const client = indexClient({ value: 5_300, session: { previous_close: 5_000 } });

			const results = await makeFetcher(client).fetch(tickers("$SPX"));
			const raw = results.get(ticker("$SPX"));
			if (raw?.ok !== true) throw new Error("expected a snapshot");

			expect(validateSnapshot(raw.value)).toMatchObject({
				ok: true,
				value: { currentPrice: 5_300, previousClose: 5_000 },
			});
		});

		it("prefers the live value over the session close", async () => {
			const client = indexClient({
				value: 5_300,
				session: { close: 5_250, previous_close: 5_000 },
			});

			const results = await makeFetcher(client).fetch(tickers("$SPX"));

			expect(results.get(ticker("$SPX"))).toMatchObject({
				ok: true,
				value: { currentPrice: 5_300, priceSource: "trade" },
			});
		});

		it("falls back to the session close when the live value is missing", async () => {
			const logger = makeLogger();
			const client = indexClient({ session: { close: 5_250, previous_close: 5_000 } });

			const results = await makeFetcher(client, {}, openGate, logger).fetch(tickers("$SPX"));

			expect(results.get(ticker("$SPX"))).toMatchObject({
				ok: true,
				value: {
					currentPrice: 5_250,
					priceSource: "day",
					priceFallback: { from: "trade", to: "day" },
				},
			});
			expect(logger.warn).toHaveBeenCalledWith(
				{ ticker: "$SPX", from: "trade", to: "day" },
				"Preferred price source empty, using fallback",
			);
		});
	});
});
