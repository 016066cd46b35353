/**
 * FileAlertStore -- JSON-document alert ledger on local disk.
 *
 * The whole ledger is one JSON document, loaded lazily on first access and
 * rewritten through a temp file and rename on every put. Writes are queued so
 * concurrent puts never interleave. Expired records are dropped on load and
 * on read, and are not written back.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { type AlertStateStore, recordKey } from "../alerts/alert-state-store.js";
import { type AlertRecord, AlertWindow } from "../alerts/types.js";
import { validate, z } from "../lib/validation/index.js";
import { StoreError } from "../shared/errors.js";
import { type Ticker, tryTicker } from "../shared/identifiers.js";
import { type Clock, SystemClock } from "../shared/time.js";

/** Configuration for creating a FileAlertStore instance. */
export interface FileAlertStoreConfig {
	readonly filePath: string;
	readonly clock?: Clock;
}

const DOCUMENT_VERSION = 1;

const recordSchema = z.object({
	ticker: z.string(),
	date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
	window: z.enum([AlertWindow.Session, AlertWindow.Minute, AlertWindow.Second]),
	lastAlertedPercent: z.number(),
	alertCount: z.number().int().positive(),
	alertedAt: z.number(),
	expiresAt: z.number(),
});

const documentSchema = z.object({
	version: z.literal(DOCUMENT_VERSION),
	records: z.array(recordSchema),
});

export class FileAlertStore implements AlertStateStore {
	private readonly filePath: string;
	private readonly clock: Clock;
	private loading: Promise<Map<string, AlertRecord>> | null = null;
	private writeQueue: Promise<void> = Promise.resolve();

	private constructor(config: FileAlertStoreConfig) {
		this.filePath = config.filePath;
		this.clock = config.clock ?? SystemClock;
	}

	static create(config: FileAlertStoreConfig): FileAlertStore {
		return new FileAlertStore(config);
	}

	/** @throws StoreError when the ledger cannot be read or is corrupt */
	async get(
		ticker: Ticker,
		date: string,
		window: AlertWindow = AlertWindow.Session,
	): Promise<AlertRecord | null> {
		const records = await this.records();
		const key = recordKey(ticker, date, window);
		const record = records.get(key);
		if (!record) return null;
		if (record.expiresAt <= this.clock.now()) {
			records.delete(key);
			return null;
		}
		return record;
	}

	/**
	 * Updates the record in memory, then persists the ledger. The in-memory
	 * update stands even if persisting fails.
	 * @throws StoreError when the ledger cannot be read or written
	 */
	async put(
		ticker: Ticker,
		date: string,
		percent: number,
		ttlMs: number,
		window: AlertWindow = AlertWindow.Session,
	): Promise<AlertRecord> {
		const run = this.writeQueue.then(async () => {
			const previous = await this.get(ticker, date, window);
			const now = this.clock.now();
			const record: AlertRecord = {
				ticker,
				date,
				window,
				lastAlertedPercent: percent,
				alertCount: (previous?.alertCount ?? 0) + 1,
				alertedAt: now,
				expiresAt: now + ttlMs,
			};
			const records = await this.records();
			records.set(recordKey(ticker, date, window), record);
			await this.persist(records);
			return record;
		});
		this.writeQueue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	/** Waits for all pending writes to complete. */
	async flush(): Promise<void> {
		await this.writeQueue;
	}

	// ── Internal ──────────────────────────────────────────────────

	private records(): Promise<Map<string, AlertRecord>> {
		if (this.loading) return this.loading;
		const loading = this.load();
		this.loading = loading;
		// a failed load is retried on the next access
		loading.catch(() => {
			if (this.loading === loading) this.loading = null;
		});
		return loading;
	}

	private async load(): Promise<Map<string, AlertRecord>> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") {
				return new Map();
			}
			throw this.storeError("read from", "get", err);
		}
		if (content.trim().length === 0) {
			return new Map();
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (err: unknown) {
			throw this.storeError("read from", "get", err, "not valid JSON");
		}
		const parsed = validate(documentSchema, raw);
		if (!parsed.ok) {
			throw this.storeError("read from", "get", parsed.error, parsed.error.describe());
		}

		const now = this.clock.now();
		const records = new Map<string, AlertRecord>();
		for (const entry of parsed.value.records) {
			const t = tryTicker(entry.ticker);
			if (t === null || entry.expiresAt <= now) continue;
			records.set(recordKey(t, entry.date, entry.window), { ...entry, ticker: t });
		}
		return records;
	}

	private async persist(records: Map<string, AlertRecord>): Promise<void> {
		const now = this.clock.now();
		const live = [...records.values()].filter((r) => r.expiresAt > now);
		const document = { version: DOCUMENT_VERSION, records: live };
		const tempPath = `${this.filePath}.tmp`;
		try {
			await mkdir(dirname(this.filePath), { recursive: true });
			await writeFile(tempPath, `${JSON.stringify(document, null, "\t")}\n`, "utf-8");
			await rename(tempPath, this.filePath);
		} catch (err: unknown) {
			throw this.storeError("write to", "put", err);
		}
	}

	private storeError(
		verb: string,
		operation: "get" | "put",
		cause: unknown,
		detail?: string,
	): StoreError {
		const code = isNodeError(cause) ? cause.code : undefined;
		const msg = detail ?? (cause instanceof Error ? cause.message : String(cause));
		const prefix = code ? `[${code}] ` : "";
		return new StoreError(`Alert store ${verb} ${this.filePath} failed: ${prefix}${msg}`, operation, {
			filePath: this.filePath,
			cause,
		});
	}
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
