export {
	averageVolume,
	barChanges,
	percentChange,
	selectPrice,
	volumeRatio,
	type SelectedPrice,
} from "./calculations.js";
export { DataValidator, validateSnapshot } from "./data-validator.js";
export {
	DEFAULT_POLYGON_BASE_URL,
	MarketDataClient,
	clientConfigFromEnv,
	type FetchFn,
	type HttpResponse,
	type MarketDataClientConfig,
	type MarketDataSource,
} from "./market-data-client.js";
export {
	SnapshotFetcher,
	type FetchOptions,
	type FetchResults,
	type FetcherSettings,
	type RequestGate,
	type SnapshotFetcherConfig,
} from "./snapshot-fetcher.js";
export {
	InstrumentKind,
	type Bar,
	type IntradayTimespan,
	type PriceCandidates,
	type PriceFallback,
	type ProviderQuote,
	type RawSnapshot,
	type RequestOptions,
	type Snapshot,
} from "./types.js";
