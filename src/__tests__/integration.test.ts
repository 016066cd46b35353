import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AlertEvent } from "../alerts/types.js";
import { type HttpResponse, MarketDataClient } from "../market/market-data-client.js";
import { createAlertRun } from "../monitor/create-alert-run.js";
import type { AlertChannel } from "../notify/types.js";
import { FileAlertStore } from "../persistence/file-alert-store.js";
import { parsePositions } from "../position/positions-parser.js";
import type { PositionInput } from "../position/types.js";
import { DEFAULT_ALERT_CONFIG } from "../shared/config.js";
import { FakeClock } from "../shared/time.js";

// 2024-03-14 11:00 in New York
const NOW = Date.UTC(2024, 2, 14, 15, 0);

const BROKER_EXPORT = [
	{
		Underlying: "AAPL",
		"Put/Call": "CALL",
		Strike: 190,
		Exp: "2024-04-19",
		Qty: 2,
		"Option Symbol": "AAPL  240419C00190000",
	},
	{ Underlying: "$SPX", "Put/Call": "PUT", Strike: 4800, Exp: "2024-03-28", Qty: 1 },
	{ Underlying: "AAPL", "Put/Call": "CALL", Strike: 190, Exp: "2024-04-19", Qty: 2 },
];

function json(body: unknown, status = 200): HttpResponse {
	return { ok: status >= 200 && status < 300, status, json: async () => body };
}

/** In-process stand-in for the provider's REST endpoints. */
class FakeProvider {
	aaplPrice = 106;
	readonly urls: string[] = [];

	readonly fetchFn = async (url: string): Promise<HttpResponse> => {
		this.urls.push(url);
		const { pathname, searchParams } = new URL(url);
		if (pathname === "/v2/snapshot/locale/us/markets/stocks/tickers/AAPL") {
			return json({
				ticker: {
					min: { c: this.aaplPrice, v: 1_200 },
					day: { c: this.aaplPrice, v: 2_000_000 },
					prevDay: { c: 100, v: 1_900_000 },
				},
			});
		}
		if (pathname === "/v3/snapshot/indices" && searchParams.get("ticker.any_of") === "I:SPX") {
			return json({
				results: [{ value: 4_900, session: { close: 4_950, previous_close: 5_200 } }],
			});
		}
		if (pathname.startsWith("/v2/aggs/ticker/AAPL/range/1/day/")) {
			return json({
				results: [
					{ c: 99, v: 1_000_000, t: 1 },
					{ c: 100, v: 3_000_000, t: 2 },
				],
			});
		}
		return json({ status: "NOT_FOUND" }, 404);
	};
}

function collector(): AlertChannel & { events: AlertEvent[] } {
	const events: AlertEvent[] = [];
	return {
		name: "collector",
		events,
		send: async (event) => {
			events.push(event);
		},
	};
}

describe("alert pipeline", () => {
	let dir: string;
	let filePath: string;
	let positions: readonly PositionInput[];

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "alert-pipeline-"));
		filePath = join(dir, "state", "alerts.json");
		const parsed = parsePositions(BROKER_EXPORT);
		if (!parsed.ok) throw parsed.error;
		positions = parsed.value.positions;
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	function runOnce(provider: FakeProvider, channel: AlertChannel) {
		const clock = new FakeClock(NOW);
		return createAlertRun({
			config: { ...DEFAULT_ALERT_CONFIG, rateLimitBurst: 10 },
			source: new MarketDataClient({
				apiKey: "test-key",
				timeoutMs: 1_000,
				fetchFn: provider.fetchFn,
			}),
			store: FileAlertStore.create({ filePath, clock }),
			channels: [channel],
			clock,
		}).run(positions);
	}

	it("alerts once per move across runs and escalates on a further step", async () => {
		const provider = new FakeProvider();

		const firstChannel = collector();
		const first = await runOnce(provider, firstChannel);

		expect(first).toMatchObject({
			positionsChecked: 2,
			uniqueTickers: 2,
			duplicatesDropped: 1,
			snapshotsFetched: 2,
			snapshotsRejected: 0,
			alerts: { initial: 2, incremental: 0, retrigger: 0, total: 2 },
			dispatch: { sent: 2, failed: 0 },
			errors: { count: 0, messages: [] },
		});
		const [aapl, spx] = firstChannel.events;
		expect(aapl).toMatchObject({
			ticker: "AAPL",
			direction: "UP",
			percentChange: 6,
			averageVolume: 2_000_000,
			volumeRatio: 1,
		});
		expect(aapl?.positions.map((p) => p.optionSymbol)).toEqual(["AAPL  240419C00190000"]);
		expect(spx?.ticker).toBe("$SPX");
		expect(spx?.direction).toBe("DOWN");
		expect(spx?.percentChange).toBeCloseTo(-5.7692, 4);
		expect(spx?.volume).toBeNull();

		const second = await runOnce(provider, collector());
		expect(second.alerts.total).toBe(0);
		expect(second.suppressed).toBe(2);

		provider.aaplPrice = 111;
		const thirdChannel = collector();
		const third = await runOnce(provider, thirdChannel);
		expect(third.alerts).toEqual({ initial: 0, incremental: 1, retrigger: 0, total: 1 });
		expect(thirdChannel.events[0]).toMatchObject({
			ticker: "AAPL",
			kind: "incremental",
			percentChange: 11,
			previousAlertedPercent: 6,
			alertCount: 2,
		});

		const ledger: unknown = JSON.parse(await readFile(filePath, "utf-8"));
		expect(ledger).toMatchObject({ version: 1 });
	});

	it("sends the API key as a query parameter", async () => {
		const provider = new FakeProvider();

		await runOnce(provider, collector());

		expect(provider.urls.every((u) => new URL(u).searchParams.get("apiKey") === "test-key")).toBe(
			true,
		);
	});
});
