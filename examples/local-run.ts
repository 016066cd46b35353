/**
 * Local Run: one alert pass over a positions export, alerts to the log.
 *
 * Reads POLYGON_API_KEY and the alert settings from the environment, keeps
 * the alert ledger in a JSON file so a second run only escalates.
 *
 * Run: npx tsx examples/local-run.ts ./positions.json [./data/alerts.json]
 */

import { readFile } from "node:fs/promises";
import {
	FileAlertStore,
	LogChannel,
	MarketDataClient,
	clientConfigFromEnv,
	configFromEnv,
	createAlertRun,
	createLogger,
	parseLogLevel,
	parsePositionsJson,
	resolveConfig,
} from "../src/index.js";

async function main(): Promise<number> {
	const [positionsPath, storePath = "./data/alerts.json"] = process.argv.slice(2);
	const logger = createLogger({ level: parseLogLevel(process.env["LOG_LEVEL"]), name: "alerts" });
	if (!positionsPath) {
		logger.error("Usage: local-run.ts <positions.json> [alerts.json]");
		return 2;
	}

	const config = resolveConfig(configFromEnv(process.env));
	const parsed = parsePositionsJson(await readFile(positionsPath, "utf8"));
	if (!parsed.ok) {
		logger.error({ err: parsed.error.describe() }, "Positions file rejected");
		return 1;
	}
	for (const skipped of parsed.value.skipped) {
		logger.warn({ row: skipped.row, reason: skipped.reason }, "Position row skipped");
	}

	const run = createAlertRun({
		config,
		source: new MarketDataClient(clientConfigFromEnv(process.env, config.fetchTimeoutMs)),
		store: FileAlertStore.create({ filePath: storePath }),
		channels: [new LogChannel(logger.child({ component: "alerts" }))],
		logger,
	});

	// one minute for the whole pass; alerts already decided still go out
	const summary = await run.run(parsed.value.positions, { deadline: Date.now() + 60_000 });
	return summary.errors.count > 0 ? 1 : 0;
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	},
);
