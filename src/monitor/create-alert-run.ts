/**
 * Composition root: wires one AlertRun from a resolved configuration.
 */

import { AlertEngine } from "../alerts/alert-engine.js";
import type { AlertStateStore } from "../alerts/alert-state-store.js";
import { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { DataValidator } from "../market/data-validator.js";
import type { MarketDataSource } from "../market/market-data-client.js";
import { SnapshotFetcher } from "../market/snapshot-fetcher.js";
import { FanoutDispatcher } from "../notify/fanout-dispatcher.js";
import type { AlertChannel } from "../notify/types.js";
import { type AlertMonitorConfig, validateConfig } from "../shared/config.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { AlertRun } from "./alert-run.js";

export interface CreateAlertRunOptions {
	readonly config: AlertMonitorConfig;
	readonly source: MarketDataSource;
	readonly store: AlertStateStore;
	readonly channels: readonly AlertChannel[];
	readonly clock?: Clock;
	readonly logger?: Logger;
}

/**
 * Builds the rate limiter, fetcher, validator, engine and dispatcher for one
 * configuration.
 * @throws ConfigurationError before anything is built if the config is invalid
 */
export function createAlertRun(options: CreateAlertRunOptions): AlertRun {
	const { config } = options;
	validateConfig(config);
	const clock = options.clock ?? SystemClock;
	const logger = options.logger ?? silentLogger;

	const limiter = new TokenBucketRateLimiter({
		capacity: config.rateLimitBurst,
		refillRate: config.providerRateLimitPerSec,
		clock,
		defaultMaxWaitMs: config.rateLimitMaxWaitMs,
	});

	return new AlertRun({
		fetcher: new SnapshotFetcher({
			source: options.source,
			gate: limiter,
			settings: config,
			clock,
			logger: logger.child({ component: "fetcher" }),
		}),
		validator: new DataValidator(logger.child({ component: "validator" })),
		engine: new AlertEngine({
			store: options.store,
			settings: config,
			clock,
			logger: logger.child({ component: "engine" }),
		}),
		dispatcher: new FanoutDispatcher(options.channels, logger.child({ component: "dispatcher" })),
		clock,
		logger,
	});
}
